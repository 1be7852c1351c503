// Supabase Service
// Edge function calls and REST table access over fetch
// NO secrets in logs

import type { BackendCredentials } from '../config.js';
import { BackendHttpError } from '../utils/errors.js';

export type FetchLike = typeof fetch;

type RestMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface RestOptions {
    query?: string;
    body?: unknown;
    returnData?: boolean;
}

export class SupabaseClient {
    private readonly url: string;
    private readonly anonKey: string;
    private accessToken: string | null = null;

    constructor(credentials: BackendCredentials, private readonly fetchImpl: FetchLike = fetch) {
        this.url = credentials.url;
        this.anonKey = credentials.anonKey;
    }

    /**
     * Signed-in user's token; requests fall back to the anon key without one
     */
    setAccessToken(token: string | null): void {
        this.accessToken = token;
    }

    /**
     * Invoke an edge function with a JSON body and decode its JSON response
     */
    async invokeFunction<T>(name: string, body: unknown): Promise<T> {
        const response = await this.fetchImpl(`${this.url}/functions/v1/${name}`, {
            method: 'POST',
            headers: {
                ...this.createHeaders(),
                'Content-Type': 'application/json',
            },
            body: JSON.stringify(body),
        });

        if (!response.ok) {
            const text = await response.text();
            throw new BackendHttpError(`function ${name}`, response.status, text);
        }

        return await response.json() as T;
    }

    /**
     * Make a REST API call against a table
     */
    async rest<T>(table: string, method: RestMethod, options: RestOptions = {}): Promise<T | null> {
        const queryStr = options.query ? `?${options.query}` : '';

        const response = await this.fetchImpl(`${this.url}/rest/v1/${table}${queryStr}`, {
            method,
            headers: {
                ...this.createHeaders(),
                'Content-Type': 'application/json',
                'Prefer': options.returnData ? 'return=representation' : 'return=minimal',
            },
            body: options.body === undefined ? undefined : JSON.stringify(options.body),
        });

        if (!response.ok) {
            const text = await response.text();
            console.error(`[supabase] ${method} ${table} failed:`, response.status);
            throw new BackendHttpError(`${method} ${table}`, response.status, text);
        }

        if (options.returnData && response.status !== 204) {
            return await response.json() as T;
        }
        return null;
    }

    private createHeaders(): Record<string, string> {
        return {
            'Authorization': `Bearer ${this.accessToken ?? this.anonKey}`,
            'apikey': this.anonKey,
        };
    }
}
