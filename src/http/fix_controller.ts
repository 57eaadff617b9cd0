import { FixKind, FixOperations, FixResult } from '../application/fix_operations';
import { DEFAULT_ENP_TARGET, EnpTarget, isEnpTarget } from '../domain/enp_profile';
import { InputValidationError, InvalidRequestError, ReconciliationError } from '../domain/errors';
import { FixRequest } from '../domain/models';

export interface FixErrorBody {
    error: string;
    message: string;
}

export interface FixResponse {
    status: number;
    body: FixResult | FixErrorBody;
}

/**
 * Transport-free request handling: token gate, body parsing, error mapping.
 * The express layer only moves headers and bodies in and out of here.
 */
export class FixController {
    constructor(
        private readonly apiToken: string,
        private readonly operations: FixOperations
    ) { }

    async handle(kind: FixKind, token: string | undefined, body: unknown): Promise<FixResponse> {
        if ((token ?? '') !== this.apiToken) {
            console.warn(`[Fix Server] UNAUTHORIZED: /fix/${kind}`);
            return { status: 401, body: { error: 'UNAUTHORIZED', message: 'Unauthorized' } };
        }

        try {
            const request = parseFixRequest(body);
            const result = await this.operations.run(kind, request);
            return { status: 200, body: result };
        } catch (error: unknown) {
            return toErrorResponse(kind, error);
        }
    }
}

/**
 * Parses the wire body `{ input, dry_run?, enp_target? }`.
 */
export function parseFixRequest(body: unknown): FixRequest {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new InvalidRequestError('Request body must be a JSON object');
    }

    const input = 'input' in body ? body.input : undefined;
    if (typeof input !== 'string') {
        throw new InvalidRequestError('input must be a string');
    }

    let dryRun = false;
    const rawDryRun = 'dry_run' in body ? body.dry_run : undefined;
    if (rawDryRun !== undefined) {
        if (typeof rawDryRun !== 'boolean') {
            throw new InvalidRequestError('dry_run must be a boolean');
        }
        dryRun = rawDryRun;
    }

    let enpTarget: EnpTarget = DEFAULT_ENP_TARGET;
    const rawEnpTarget = 'enp_target' in body ? body.enp_target : undefined;
    if (rawEnpTarget !== undefined) {
        if (!isEnpTarget(rawEnpTarget)) {
            throw new InvalidRequestError('enp_target must be one of NXP1, NXP2');
        }
        enpTarget = rawEnpTarget;
    }

    return { input, dryRun, enpTarget };
}

export function toErrorResponse(kind: FixKind, error: unknown): FixResponse {
    if (error instanceof InputValidationError) {
        console.warn(`[Fix Server] REJECTED /fix/${kind}: ${error.message}`);
        return { status: 400, body: { error: error.code, message: error.message } };
    }

    if (error instanceof ReconciliationError) {
        console.error(`[Fix Server] FAILED /fix/${kind}: ${error.message}`);
        return { status: 500, body: { error: error.code, message: error.message } };
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Fix Server] INTERNAL ERROR /fix/${kind}: ${message}`);
    return { status: 500, body: { error: 'INTERNAL_ERROR', message } };
}
