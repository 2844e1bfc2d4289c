export interface Embedder {
  getEmbeddings: (text: string) => Promise<number[]>;
}
