export interface StoredFileRecord {
  readonly originalName: string;
  /** Generated, collision-resistant name on disk */
  readonly filename: string;
  readonly size: number;
  /** Storage path with forward slashes */
  readonly path: string;
  readonly uploadedAt: Date;
  readonly contentType: string;
}
