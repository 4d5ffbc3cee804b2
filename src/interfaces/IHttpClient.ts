export interface HttpGetOptions {
    params?: Record<string, string>;
    timeoutMs?: number;
}

export interface IHttpClient {
    /** GET a URL and return the decoded JSON body */
    getJson(url: string, options?: HttpGetOptions): Promise<unknown>;
}

export class HttpRequestError extends Error {
    constructor(
        public readonly url: string,
        public readonly status: number | null,
        message: string
    ) {
        super(status === null ? `Request to ${url} failed: ${message}` : `Request to ${url} returned ${status}: ${message}`);
        this.name = "HttpRequestError";
    }
}
