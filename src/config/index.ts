import dotenv from 'dotenv';

dotenv.config();

// Logged by the caller once the logger exists; the logger itself reads config.
export const configWarnings: string[] = [];

const readNumber = (name: string, fallback: number): number => {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        configWarnings.push(`${name}="${raw}" is not a number, using ${fallback}.`);
        return fallback;
    }
    return value;
};

const config = {
    accessToken: process.env.ACCESS_TOKEN || '',
    // Consumer key; sent as the `apikey` query parameter for delayed, unauthenticated quotes.
    apiKey: process.env.API_KEY || '',
    baseUrl: process.env.BASE_URL || 'https://api.tdameritrade.com/v1/',
    port: readNumber('PORT', 3001),
    logLevel: process.env.LOG_LEVEL || 'info',
    requestTimeoutMs: readNumber('REQUEST_TIMEOUT_MS', 10000),
    maxRetries: readNumber('MAX_RETRIES', 5),
    retryBackoffMs: readNumber('RETRY_BACKOFF_MS', 2000),
};

export default config;
