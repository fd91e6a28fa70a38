import * as fs from 'fs/promises';
import { ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { FileStat, FileSystemPort, FsError } from '../../../ports/fs.port.js';

export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  const code: unknown = e.code;
  return typeof code === 'string' ? code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  readdir(dirPath: string): ResultAsync<readonly string[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath), (e) => mapFsError(e, dirPath));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(fs.readFile(filePath), (e) => mapFsError(e, filePath)).map((b) => new Uint8Array(b));
  }

  stat(filePath: string): ResultAsync<FileStat, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((s) => ({
      sizeBytes: s.size,
      mtimeMs: s.mtimeMs,
    }));
  }

  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, bytes), (e) => mapFsError(e, filePath));
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath), (e) => mapFsError(e, filePath));
  }

  /**
   * A failed write or sync removes the half-written file so it cannot hold
   * the lock without a readable owner.
   */
  createExclusive(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(
      (async () => {
        // 'wx' = O_CREAT | O_EXCL | O_WRONLY
        const handle = await fs.open(filePath, 'wx', 0o644);
        try {
          await handle.writeFile(bytes);
          await handle.sync();
        } catch (e) {
          await handle.close();
          await fs.unlink(filePath).catch((cleanup: unknown) => {
            if (nodeErrorCode(cleanup) === 'ENOENT') return;
            throw new Error(
              `${e instanceof Error ? e.message : String(e)}; removing the partial file failed: ${
                cleanup instanceof Error ? cleanup.message : String(cleanup)
              }`
            );
          });
          throw e;
        }
        await handle.close();
      })(),
      (e) => mapFsError(e, filePath)
    );
  }
}
