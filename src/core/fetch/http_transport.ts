import axios, { AxiosInstance } from 'axios';

export interface HttpRequest {
    url: string;
    headers: Record<string, string>;
    timeoutMs: number;
}

export interface HttpResponse {
    status: number;
    body: string;
}

/**
 * Raw GET transport. Any status is a response; only transport-level failures
 * (DNS, refused connection, timeout) reject.
 */
export interface HttpTransport {
    get(request: HttpRequest): Promise<HttpResponse>;
}

export class AxiosTransport implements HttpTransport {
    constructor(private readonly client: AxiosInstance = axios.create({ maxRedirects: 4 })) { }

    async get(request: HttpRequest): Promise<HttpResponse> {
        const resp = await this.client.get<unknown>(request.url, {
            headers: request.headers,
            timeout: request.timeoutMs,
            responseType: 'text',
            validateStatus: () => true,
        });

        const body = typeof resp.data === 'string' ? resp.data : JSON.stringify(resp.data ?? '');
        return { status: resp.status, body };
    }
}
