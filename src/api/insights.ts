/**
 * Insight endpoint.
 * POST /insights: analyse one piece of customer feedback
 */

import { pipeline, jsonResponse, validateBody, type Handler } from '../middleware/index.js';
import type { Container } from '../container.js';
import { EXAMPLE_FEEDBACK } from '../services/InputValidator.js';
import type { InsightRequestBody } from '../types/api.js';
import type { FieldSchema } from '../types/common.js';

// Types only; length and content rules live in InputValidator.
const insightSchema: Record<keyof InsightRequestBody, FieldSchema> = {
  text: { type: 'string', required: true },
  source: { type: 'string', required: false },
  category: { type: 'string', required: false },
};

export function createInsightHandlers(container: Container) {
  const analyze: Handler = pipeline(
    container.errorHandler,
    validateBody(insightSchema, { example: EXAMPLE_FEEDBACK })
  )(async (req) => {
    const body: unknown = await req.json();
    const result = await container.insightPipeline.run(body, req.signal);

    return jsonResponse(result, result.status === 'success' ? 200 : 500);
  });

  return { analyze };
}
