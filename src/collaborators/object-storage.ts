import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CollaboratorCallError } from './call-collaborator.js';
import type { ObjectStorage } from './types.js';

const STORE_SCHEME = 'store://';

/**
 * `store://<key>` locators live as files under the storage root; http(s)
 * URLs are downloaded. Other schemes are not reachable from this process.
 */
export class LocalObjectStorage implements ObjectStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async fetch(locator: string, signal: AbortSignal): Promise<Buffer> {
    if (locator.startsWith(STORE_SCHEME)) {
      try {
        return await readFile(this.resolveKey(locator), { signal });
      } catch (err) {
        if (err instanceof CollaboratorCallError) throw err;
        throw new CollaboratorCallError('unavailable', `Cannot read ${locator}`);
      }
    }

    if (locator.startsWith('http://') || locator.startsWith('https://')) {
      const response = await fetch(locator, { signal, redirect: 'follow' });
      if (response.status === 429) throw new CollaboratorCallError('quota', `${locator} rate limited (429)`);
      if (!response.ok) throw new CollaboratorCallError('unavailable', `${locator} returned ${response.status}`);
      return Buffer.from(await response.arrayBuffer());
    }

    throw new CollaboratorCallError('unavailable', `Unsupported locator scheme: ${locator}`);
  }

  async store(locator: string, bytes: Buffer | string): Promise<string> {
    if (!locator.startsWith(STORE_SCHEME)) {
      throw new CollaboratorCallError('unavailable', `Cannot write to ${locator}`);
    }
    const filePath = this.resolveKey(locator);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, bytes);
    return locator;
  }

  private resolveKey(locator: string): string {
    const key = locator.slice(STORE_SCHEME.length);
    const filePath = path.resolve(this.root, key);
    if (key === '' || !filePath.startsWith(this.root + path.sep)) {
      throw new CollaboratorCallError('unavailable', `Locator escapes the storage root: ${locator}`);
    }
    return filePath;
  }
}
