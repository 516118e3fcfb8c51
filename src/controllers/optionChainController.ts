import { z } from 'zod';
import {
    DecodeError,
    FormatError,
    QueryStatusError,
    TransportError,
    ValidationError,
} from '../api/chains/errors';
import { OptionChainQuery } from '../api/chains/types';
import { OptionChainService } from '../services/optionChainService';
import { formatPath } from '../api/chains/wire';
import { logger } from '../utils/logger';

const optionalNumber = z.coerce.number().finite().optional();

// Query strings arrive as text; enumerations are left to validateOptionChainQuery.
const chainParamsSchema = z.object({
    contractType: z.string().optional(),
    strikeCount: optionalNumber,
    includeQuotes: z
        .enum(['true', 'false'])
        .transform((value) => value === 'true')
        .optional(),
    strategy: z.string().optional(),
    interval: optionalNumber,
    strike: optionalNumber,
    range: z.string().optional(),
    fromDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD').optional(),
    toDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD').optional(),
    volatility: optionalNumber,
    underlyingPrice: optionalNumber,
    interestRate: optionalNumber,
    daysToExpiration: optionalNumber,
    expMonth: z.string().optional(),
    optionType: z.string().optional(),
});

// The slice of express' Request and Response the controller touches
export interface ChainRequest {
    params: { symbol?: string };
    query: unknown;
}

export interface JsonResponse {
    status(code: number): JsonResponse;
    json(body: unknown): unknown;
}

// Upstream statuses worth passing through as-is; anything else is a bad gateway.
const PASSTHROUGH_STATUSES = new Set([401, 403, 404, 429]);

export class OptionChainController {
    constructor(private readonly optionChainService: OptionChainService) {}

    public async getOptionChain(req: ChainRequest, res: JsonResponse): Promise<void> {
        const symbol = req.params.symbol ?? '';
        const parsed = chainParamsSchema.safeParse(req.query);
        if (!parsed.success) {
            const [issue] = parsed.error.issues;
            res.status(400).json({
                error: issue ? `${formatPath(issue.path)}: ${issue.message}` : parsed.error.message,
            });
            return;
        }

        const query: OptionChainQuery = parsed.data;
        try {
            const chain = await this.optionChainService.fetchOptionChain(symbol, query);
            res.status(200).json(chain);
        } catch (error) {
            this.sendError(res, error);
        }
    }

    private sendError(res: JsonResponse, error: unknown): void {
        if (error instanceof ValidationError) {
            res.status(400).json({ error: error.message, field: error.field, allowed: error.allowed });
        } else if (error instanceof QueryStatusError) {
            res.status(422).json({ error: error.message, status: error.status });
        } else if (error instanceof FormatError || error instanceof DecodeError) {
            res.status(502).json({ error: error.message, path: error.path });
        } else if (error instanceof TransportError) {
            const status = error.status !== undefined && PASSTHROUGH_STATUSES.has(error.status) ? error.status : 502;
            res.status(status).json({ error: error.message });
        } else {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`[HTTP] Unexpected error: ${message}`);
            res.status(500).json({ error: message });
        }
    }
}
