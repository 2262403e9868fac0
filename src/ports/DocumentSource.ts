export interface Document {
  /** File name relative to the document root. */
  id: string;
  text: string;
}

export interface DocumentSource {
  load(): Promise<Document[]>;
}
