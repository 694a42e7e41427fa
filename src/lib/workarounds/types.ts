import { z } from 'zod';
import { AdminRequest, AdminResponse } from '../../types/admin-types';
import { Settings } from '../../types/settings';
import { Logger } from '../logger';

/**
 * What a workaround strategy may use from the manager
 */
export interface OperationContext {
  readonly settings: Settings;
  readonly logger: Logger;

  /** Send without any status handling */
  send(request: AdminRequest): Promise<AdminResponse>;

  /** Send, then decode a 2xx body with `schema` or raise AdminError */
  call<S extends z.ZodTypeAny>(request: AdminRequest, schema: S): Promise<z.infer<S>>;
}

/**
 * An operation the server has no single endpoint for, built from the
 * primitives it does have. `steps` lists the requests issued, in order.
 */
export interface AdminOperation<TInput, TResult> {
  readonly name: string;
  readonly steps: readonly string[];
  execute(context: OperationContext, input: TInput): Promise<TResult>;
}

export function logStep(
  context: OperationContext,
  operation: Pick<AdminOperation<never, unknown>, 'name' | 'steps'>,
  index: number
): void {
  context.logger.debug(`${operation.name} step ${index + 1}/${operation.steps.length}: ${operation.steps[index]}`);
}
