/**
 * Netlify Function entry point.
 * Single function handles /insights and /segments via the router.
 */

import type { Config, Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import type { Container } from '../../src/container.js';
import { getProductionContainer } from '../../src/container.production.js';
import { describeError } from '../../src/errors.js';
import { jsonResponse } from '../../src/middleware/pipeline.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { ApiErrorResponse } from '../../src/types/api.js';

let router: ReturnType<typeof createRouter> | null = null;

// Reports startup failures before any configured log provider exists.
const startupLog = new ConsoleLogProvider({ outputToConsole: true, maxEvents: 0 });

export default async (req: Request, context: Pick<Context, 'requestId'>) => {
  let container: Container;
  try {
    container = getProductionContainer();
  } catch (err) {
    // Not cached: the next request tries the startup again.
    startupLog.error('Function startup failed', { error: describeError(err) });
    const body: ApiErrorResponse = {
      status: 'error',
      code: 'INTERNAL_ERROR',
      error: 'An unexpected error occurred',
    };
    return jsonResponse(body, 500);
  }
  if (!router) router = createRouter(container);

  try {
    return await router.handle(req, { requestId: context.requestId || null });
  } finally {
    await container.logProvider.flush();
  }
};

export const config: Config = {
  path: ['/insights', '/segments'],
};
