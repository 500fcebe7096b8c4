import { NetworkError } from '../errors.js';
import type { Downloader } from '../interfaces.js';

/**
 * Downloader over the global `fetch`. Redirects are followed, as release
 * assets are served from a CDN behind one.
 */
export class HttpDownloader implements Downloader {
  constructor(private readonly userAgent = 'wasmwright') {}

  async download(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(url, {
        redirect: 'follow',
        headers: { 'user-agent': this.userAgent },
      });
    } catch (error) {
      throw new NetworkError(url, undefined, { cause: error });
    }

    if (!response.ok) {
      throw new NetworkError(url, response.status);
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new NetworkError(url, undefined, { cause: error });
    }
  }
}
