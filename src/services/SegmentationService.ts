/**
 * Customer segmentation proxy.
 * Validates pre-normalized feature vectors, finds the active k-means endpoint
 * by name and forwards the rows as CSV.
 */

import { z } from 'zod';
import { InvalidInputError, NotFoundError, UpstreamError } from '../errors.js';
import type { IClusteringProvider } from '../providers/IClusteringProvider.js';
import type { SegmentationResult } from '../types/models.js';
import { createDeadline, raceAbort } from './deadline.js';

export const EXAMPLE_FEATURES = {
  features: [
    [-1.14, -1.13, 0.68],
    [-1.67, -0.81, -0.22],
  ],
};

export const SEGMENTATION_MODEL = 'K-means Customer Segmentation';

const predictionsSchema = z.object({
  predictions: z.array(
    z.object({
      closest_cluster: z.number(),
      distance_to_cluster: z.number(),
    })
  ),
});

export interface SegmentationOptions {
  endpointKeyword: string;
  requestTimeoutMs: number;
}

export class SegmentationService {
  constructor(
    private readonly clustering: IClusteringProvider,
    private readonly opts: SegmentationOptions
  ) {}

  async segment(payload: unknown, signal?: AbortSignal): Promise<SegmentationResult> {
    const features = this.validateFeatures(payload);
    const deadline = createDeadline(this.opts.requestTimeoutMs, signal);

    try {
      const endpoint = await this.resolveEndpoint(deadline.signal);

      let reply: unknown;
      try {
        reply = await raceAbort(
          this.clustering.invoke(endpoint, toCsv(features), deadline.signal),
          deadline.signal
        );
      } catch (err) {
        throw new UpstreamError('Clustering endpoint invocation failed', { cause: err });
      }

      const parsed = predictionsSchema.safeParse(reply);
      if (!parsed.success) {
        throw new UpstreamError('Clustering endpoint returned an unexpected response', {
          cause: parsed.error,
        });
      }

      return {
        predictions: parsed.data.predictions.map((p) => ({
          closestCluster: p.closest_cluster,
          distanceToCluster: p.distance_to_cluster,
        })),
        endpoint,
        featuresProcessed: features.length,
      };
    } finally {
      deadline.dispose();
    }
  }

  private validateFeatures(payload: unknown): number[][] {
    const features =
      typeof payload === 'object' && payload !== null && 'features' in payload
        ? payload.features
        : undefined;

    if (!Array.isArray(features) || features.length === 0) {
      throw new InvalidInputError('Missing features array', EXAMPLE_FEATURES);
    }

    return features.map((row: unknown, i) => {
      if (
        !Array.isArray(row) ||
        row.length === 0 ||
        !row.every((v): v is number => typeof v === 'number' && Number.isFinite(v))
      ) {
        throw new InvalidInputError(
          `features[${i}] must be a non-empty array of numbers`,
          EXAMPLE_FEATURES
        );
      }
      return row;
    });
  }

  private async resolveEndpoint(signal: AbortSignal): Promise<string> {
    let names: string[];
    try {
      names = await raceAbort(this.clustering.listEndpoints(signal), signal);
    } catch (err) {
      throw new UpstreamError('Could not list clustering endpoints', { cause: err });
    }

    const keyword = this.opts.endpointKeyword.toLowerCase();
    const match = names.find((name) => name.toLowerCase().includes(keyword));

    if (!match) {
      throw new NotFoundError(`No ${this.opts.endpointKeyword} endpoint found`);
    }
    return match;
  }
}

/** One row per line, values comma separated. */
export function toCsv(rows: number[][]): string {
  return rows.map((row) => row.join(',')).join('\n');
}
