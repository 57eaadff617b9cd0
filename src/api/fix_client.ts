import axios, { AxiosInstance, AxiosError } from 'axios';
import { EnpTarget } from '../domain/enp_profile';
import { EnpFixResult, NprnFixResult, DispFixResult } from '../domain/models';

export class FixApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly kind?: string
    ) {
        super(message);
        this.name = 'FixApiError';
    }
}

export class UnauthorizedError extends FixApiError {
    constructor() {
        super('Unauthorized', 401, 'UNAUTHORIZED');
        this.name = 'UnauthorizedError';
    }
}

export interface FixCallOptions {
    dryRun?: boolean;
    enpTarget?: EnpTarget;
}

interface ErrorBody {
    error?: unknown;
    message?: unknown;
}

/**
 * HTTP client for the three /fix endpoints.
 */
export class FixClient {
    private client: AxiosInstance;

    constructor(apiToken: string, baseUrl: string) {
        this.client = axios.create({
            baseURL: baseUrl,
            headers: {
                'x-api-token': apiToken,
                'Content-Type': 'application/json',
            },
            timeout: 10000,
        });

        this.setupInterceptors();
    }

    private setupInterceptors() {
        this.client.interceptors.response.use(
            (response) => response,
            (error: AxiosError<ErrorBody>) => {
                if (error.response) {
                    const status = error.response.status;
                    const data = error.response.data ?? {};

                    if (status === 401) {
                        throw new UnauthorizedError();
                    }

                    throw new FixApiError(
                        typeof data.message === 'string' ? data.message : `API Error: ${status}`,
                        status,
                        typeof data.error === 'string' ? data.error : undefined
                    );
                }
                throw error;
            }
        );
    }

    async fixEnp(input: string, options: FixCallOptions = {}): Promise<EnpFixResult> {
        const response = await this.client.post<EnpFixResult>('/fix/enp', this.body(input, options));
        return response.data;
    }

    async fixNprn(input: string, options: FixCallOptions = {}): Promise<NprnFixResult> {
        const response = await this.client.post<NprnFixResult>('/fix/nprn', this.body(input, options));
        return response.data;
    }

    async fixDisp(input: string, options: FixCallOptions = {}): Promise<DispFixResult> {
        const response = await this.client.post<DispFixResult>('/fix/disp', this.body(input, options));
        return response.data;
    }

    private body(input: string, options: FixCallOptions) {
        return {
            input,
            dry_run: options.dryRun ?? false,
            enp_target: options.enpTarget ?? EnpTarget.NXP1,
        };
    }
}
