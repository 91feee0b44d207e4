/**
 * Analyzer capability
 *
 * Every tool takes one JSON object of named parameters and resolves to a
 * JSON-serializable result or rejects with an ApiGraphError.
 */

import { z } from 'zod';
import { InvalidParametersError } from '../core/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('analyzer');

export interface Analyzer<P = unknown, R = unknown> {
  readonly name: string;
  readonly description: string;

  /** Parameter schema; `run` validates against it before doing any work */
  readonly parameters: z.ZodType<P, z.ZodTypeDef, unknown>;

  /** Example parameter object, shown by `--help` style listings */
  readonly example: Record<string, unknown>;

  run(params: unknown): Promise<R>;
}

/**
 * Validates parameters with zod, then hands the typed object to `execute`.
 */
export abstract class BaseAnalyzer<P, R> implements Analyzer<P, R> {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly parameters: z.ZodType<P, z.ZodTypeDef, unknown>;
  abstract readonly example: Record<string, unknown>;

  async run(params: unknown): Promise<R> {
    const parsed = this.parameters.safeParse(params ?? {});
    if (!parsed.success) {
      throw new InvalidParametersError(
        this.name,
        parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }

    const started = Date.now();
    const result = await this.execute(parsed.data);
    logger.debug({ analyzer: this.name, durationMs: Date.now() - started }, 'Analyzer finished');
    return result;
  }

  protected abstract execute(params: P): Promise<R>;
}
