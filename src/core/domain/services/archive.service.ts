export interface IArchiveService {
  /** Writes a compressed archive holding `files` flattened to their base names. */
  createArchive(destination: string, files: string[]): Promise<void>;
}
