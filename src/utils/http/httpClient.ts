// src/utils/http/httpClient.ts

import type { FetchFn, IHttpClientOptions } from '../../@types/index.ts';
import { Buffer } from 'node:buffer';
import { HttpStatusError, NetworkError, toError } from '../errors/errors.ts';

/**
 * Thin GET-only client over the Fetch API. Every request follows redirects, carries the
 * configured user agent and is bounded by one overall timeout.
 */
export class HttpClient {
    private readonly fetchFn: FetchFn;

    constructor(private readonly options: IHttpClientOptions) {
        this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    }

    /**
     * Downloads the body of `url` as bytes.
     *
     * @throws {NetworkError} When the request or the body transfer fails.
     * @throws {HttpStatusError} When the server answers with a non-2xx status.
     */
    async getBytes(url: string): Promise<Buffer> {
        const response = await this.request(url);
        try {
            return Buffer.from(await response.arrayBuffer());
        } catch (error) {
            throw new NetworkError(url, `Reading response body from ${url} failed: ${toError(error).message}`, {
                cause: error,
            });
        }
    }

    async getText(url: string): Promise<string> {
        const bytes = await this.getBytes(url);
        return bytes.toString('utf-8');
    }

    private async request(url: string): Promise<Response> {
        let response: Response;
        try {
            response = await this.fetchFn(url, {
                headers: { 'User-Agent': this.options.userAgent },
                redirect: 'follow',
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });
        } catch (error) {
            throw new NetworkError(url, `Request to ${url} failed: ${toError(error).message}`, { cause: error });
        }
        if (!response.ok) {
            throw new HttpStatusError(url, response.status, response.statusText);
        }
        return response;
    }
}
