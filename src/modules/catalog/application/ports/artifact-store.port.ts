/**
 * One-shot handoff of rendered documents. `take` reads and deletes atomically:
 * a token redeems at most once.
 */
export interface ArtifactStorePort {
  put(content: Buffer): Promise<string>;
  take(token: string): Promise<Buffer | null>;
}
