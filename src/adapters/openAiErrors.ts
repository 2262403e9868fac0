import { getErrorMessage } from '../errors';

/** Status-aware message for errors thrown by the OpenAI SDK. */
export function describeOpenAiError(error: unknown): string {
    if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
        switch (error.status) {
            case 401:
            case 403:
                return `authentication failed (${error.status})`;
            case 404:
                return 'model not found (404)';
            case 429:
                return 'rate limited (429)';
            default:
                return `HTTP ${error.status}: ${error.message}`;
        }
    }
    return getErrorMessage(error);
}
