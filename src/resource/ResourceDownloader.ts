import type { Logger } from 'winston';
import { DownloadError, errorMessage } from '../execution/ErrorHandling.js';
import type { SandboxConfig } from '../utils/SandboxConfig.js';

export interface ResourceDownloaderDeps {
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/**
 * Fetches guest code over HTTP(S) with a size cap and a timeout.
 */
export class ResourceDownloader {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: SandboxConfig['download'],
    private readonly deps: ResourceDownloaderDeps = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  public async download(rawUrl: string): Promise<Uint8Array> {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch {
      throw new DownloadError(`Invalid resource URL: ${rawUrl}`, { url: rawUrl });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new DownloadError(`Unsupported resource URL protocol: ${url.protocol}`, { url: rawUrl });
    }

    const { maxBytes, timeoutMs } = this.config;
    const signal = AbortSignal.timeout(timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal });
    } catch (error) {
      throw this.failure(error, rawUrl);
    }

    if (!response.ok) {
      throw new DownloadError(`Resource download failed with HTTP ${response.status}`, {
        url: rawUrl,
        status: response.status,
      });
    }

    const declared = Number(response.headers.get('content-length') ?? Number.NaN);
    if (Number.isFinite(declared) && declared > maxBytes) {
      throw new DownloadError(`Resource of ${declared} bytes exceeds limit of ${maxBytes} bytes`, {
        url: rawUrl,
        size: declared,
        limit: maxBytes,
      });
    }

    const bytes = await this.readCapped(response, rawUrl, maxBytes);
    this.deps.logger?.debug('Downloaded resource', { url: rawUrl, sizeBytes: bytes.length });
    return bytes;
  }

  private async readCapped(response: Response, rawUrl: string, maxBytes: number): Promise<Uint8Array> {
    if (!response.body) {
      return new Uint8Array(0);
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let size = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        size += value.length;
        if (size > maxBytes) {
          await reader.cancel();
          throw new DownloadError(`Resource exceeds limit of ${maxBytes} bytes`, {
            url: rawUrl,
            limit: maxBytes,
          });
        }
        chunks.push(value);
      }
    } catch (error) {
      throw this.failure(error, rawUrl);
    }
    return new Uint8Array(Buffer.concat(chunks, size));
  }

  private failure(error: unknown, rawUrl: string): DownloadError {
    if (error instanceof DownloadError) {
      return error;
    }
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new DownloadError(`Resource download timed out after ${this.config.timeoutMs}ms`, {
        url: rawUrl,
        timeoutMs: this.config.timeoutMs,
      });
    }
    return new DownloadError(`Resource download failed: ${errorMessage(error)}`, { url: rawUrl });
  }
}
