import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { DigestPort } from '../../../ports/digest.port.js';
import type { FsError } from '../../../ports/fs.port.js';
import { asSha256Hex, type Sha256Hex } from '../../../domain/ids.js';
import { mapFsError } from '../fs/index.js';

export class NodeDigest implements DigestPort {
  sha256(bytes: Uint8Array): Sha256Hex {
    return asSha256Hex(createHash('sha256').update(bytes).digest('hex'));
  }

  sha256File(filePath: string): ResultAsync<Sha256Hex, FsError> {
    return RA.fromPromise(
      (async () => {
        const hash = createHash('sha256');
        for await (const chunk of createReadStream(filePath)) {
          hash.update(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
        }
        return asSha256Hex(hash.digest('hex'));
      })(),
      (e) => mapFsError(e, filePath)
    );
  }
}
