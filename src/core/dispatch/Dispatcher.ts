import { ApiMeta } from '../modules/types';
import { ModuleRegistry } from '../modules/ModuleRegistry';
import { ErrorFactory, HandlerError, RpcError, getErrorMessage } from '../errors';
import { Logger } from '../logging/Logger';
import { formatZodIssues } from '../schema/schemas';
import { CallRequest, CallResponse, failureResponse, successResponse } from '../protocol/envelope';
import { BlockingHandlerPool } from './BlockingHandlerPool';

/**
 * Correlation details carried into logs only.
 */
export interface DispatchContext {
    requestId?: number;
    connectionId?: string;
}

/**
 * Resolves a call against the registry, runs its handler and turns every
 * outcome into a CallResponse. `dispatch` never rejects.
 */
export class Dispatcher {
    constructor(
        private readonly registry: ModuleRegistry,
        private readonly blockingPool: BlockingHandlerPool
    ) { }

    public async dispatch(request: CallRequest, context: DispatchContext = {}): Promise<CallResponse> {
        const origin = request.unified_msg_origin;
        const logContext = { module: request.module_id, method: request.method, ...context };

        try {
            Logger.debug('Dispatcher', 'Received call', logContext);
            const data = await this.execute(request);
            Logger.debug('Dispatcher', 'Call completed', logContext);
            return successResponse(origin, data);
        } catch (error) {
            const message = getErrorMessage(error);
            const code = error instanceof RpcError ? error.code : 'INTERNAL_ERROR';
            Logger.warn('Dispatcher', `Call failed: ${message}`, { ...logContext, code });
            return failureResponse(origin, message);
        }
    }

    private async execute(request: CallRequest): Promise<Record<string, unknown>> {
        const resolved = this.registry.resolve(request.module_id, request.method);
        if (resolved.status === 'unknown_module') {
            throw ErrorFactory.unknownModule(request.module_id);
        }
        if (resolved.status === 'unknown_method') {
            throw ErrorFactory.unknownMethod(request.module_id, request.method);
        }

        const { meta } = resolved;

        const params = meta.paramType.safeParse(request.params);
        if (!params.success) {
            throw ErrorFactory.validation(`Validation Error: ${formatZodIssues(params.error)}`, {
                details: { module: request.module_id, method: request.method }
            });
        }

        const result = await this.invoke(meta, params.data);

        const checked = meta.responseType.safeParse(result);
        if (!checked.success) {
            throw ErrorFactory.typeMismatch(request.module_id, request.method, {
                details: { issues: formatZodIssues(checked.error) }
            });
        }
        return checked.data;
    }

    private async invoke(meta: ApiMeta, params: unknown): Promise<unknown> {
        const target = meta.handler;

        if (target.kind === 'worker') {
            // Pool failures already carry the handler's message.
            return this.blockingPool.run({ file: target.file, exportName: target.exportName, params });
        }

        try {
            return await target.invoke(params);
        } catch (error) {
            if (error instanceof HandlerError) throw error;
            throw ErrorFactory.handler(getErrorMessage(error), {
                details: { errorName: error instanceof Error ? error.name : typeof error }
            });
        }
    }
}
