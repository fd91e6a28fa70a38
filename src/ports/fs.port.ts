import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

export interface FileStat {
  readonly sizeBytes: number;
  readonly mtimeMs: number;
}

/**
 * Port: Directory operations.
 * Used by: cache layout consumers (catalog, table store, artifact cache).
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;
  /**
   * List directory entry names (not full paths).
   * Used for enumerating downloaded manifests.
   */
  readdir(dirPath: string): ResultAsync<readonly string[], FsError>;
}

/**
 * Port: File reading and metadata.
 */
export interface FileReadPort {
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
  stat(filePath: string): ResultAsync<FileStat, FsError>;
}

/**
 * Port: File manipulation.
 *
 * Crash-safe installs are composed by callers as
 * writeFileBytes(tmp) -> rename(tmp, final); rename is atomic on one filesystem.
 */
export interface FileManipulationPort {
  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;
  unlink(filePath: string): ResultAsync<void, FsError>;
  /**
   * Create file exclusively (fails with FS_ALREADY_EXISTS if it exists),
   * write `bytes`, fsync and close. Used for lock files.
   */
  createExclusive(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
}

export interface FileSystemPort extends DirectoryOpsPort, FileReadPort, FileManipulationPort {}
