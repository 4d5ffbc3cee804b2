import axios, { type AxiosInstance } from 'axios';
import { type HttpGetOptions, HttpRequestError, type IHttpClient } from '../interfaces/IHttpClient';

const DEFAULT_TIMEOUT_MS = 30_000;

export class AxiosAdapter implements IHttpClient {
    private client: AxiosInstance;

    constructor(client: AxiosInstance = axios.create({ headers: { Accept: 'application/json' } })) {
        this.client = client;
    }

    async getJson(url: string, options: HttpGetOptions = {}): Promise<unknown> {
        try {
            const response = await this.client.get<unknown>(url, {
                params: options.params,
                timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
                responseType: 'json',
            });
            return response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status ?? null;
                const body = error.response?.data;
                const detail = typeof body === 'string' && body.length > 0 ? body.slice(0, 200) : error.message;
                throw new HttpRequestError(url, status, detail);
            }
            throw error;
        }
    }
}
