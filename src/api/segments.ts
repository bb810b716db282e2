/**
 * Segmentation endpoint.
 * POST /segments: assign customers to k-means clusters
 */

import { pipeline, jsonResponse, validateBody, type Handler } from '../middleware/index.js';
import type { Container } from '../container.js';
import { EXAMPLE_FEATURES, SEGMENTATION_MODEL } from '../services/SegmentationService.js';
import type { SegmentRequestBody, SegmentResponseBody } from '../types/api.js';
import type { FieldSchema } from '../types/common.js';

// Row contents are checked by SegmentationService.
const segmentSchema: Record<keyof SegmentRequestBody, FieldSchema> = {
  features: { type: 'array', required: false },
};

export function createSegmentHandlers(container: Container) {
  const predict: Handler = pipeline(
    container.errorHandler,
    validateBody(segmentSchema, { example: EXAMPLE_FEATURES })
  )(async (req) => {
    const body: unknown = await req.json();
    const result = await container.segmentationService.segment(body, req.signal);

    const response: SegmentResponseBody = {
      predictions: result.predictions.map((p) => ({
        closest_cluster: p.closestCluster,
        distance_to_cluster: p.distanceToCluster,
      })),
      endpoint: result.endpoint,
      model: SEGMENTATION_MODEL,
      features_processed: result.featuresProcessed,
    };

    return jsonResponse(response);
  });

  return { predict };
}
