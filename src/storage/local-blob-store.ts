import fs from 'fs/promises';
import path from 'path';
import type { BlobStore } from '../capabilities/index.js';
import { FatalError } from '../errors/index.js';
import { downloadMedia } from '../integrations/http.js';

export interface LocalBlobStoreConfig {
  dir: string;
  publicBaseUrl: string;
}

/**
 * Copies generated assets into a directory served under `publicBaseUrl`, so
 * published media outlives the provider's short-lived asset URLs.
 */
export class LocalBlobStore implements BlobStore {
  constructor(private readonly config: LocalBlobStoreConfig) {}

  async put(assetRef: string, blobPath: string): Promise<string> {
    const target = path.resolve(this.config.dir, blobPath);
    if (!target.startsWith(path.resolve(this.config.dir) + path.sep)) {
      throw new FatalError(`Blob path escapes storage directory: ${blobPath}`);
    }

    const data = /^https?:\/\//.test(assetRef)
      ? (await downloadMedia('BlobStore', assetRef)).data
      : await fs.readFile(assetRef);

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);

    const base = this.config.publicBaseUrl.replace(/\/+$/, '');
    return `${base}/${blobPath.split(path.sep).join('/')}`;
  }
}
