import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import type { ContentHasher } from '@objledger/core';

/**
 * Streaming SHA-256 over a whole file
 */
export class Sha256Hasher implements ContentHasher {
  async hashFile(path: string): Promise<string> {
    const hash = createHash('sha256');
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk);
    }
    return hash.digest('hex');
  }
}
