import { describe, it, expect, beforeEach } from 'vitest';
import {
  EXAMPLE_FEATURES,
  SegmentationService,
  toCsv,
} from '../../src/services/SegmentationService.js';
import { InvalidInputError, NotFoundError, UpstreamError } from '../../src/errors.js';
import { MockClusteringProvider } from '../mocks/MockClusteringProvider.js';

describe('SegmentationService', () => {
  let clustering: MockClusteringProvider;
  let service: SegmentationService;

  beforeEach(() => {
    clustering = new MockClusteringProvider();
    service = new SegmentationService(clustering, {
      endpointKeyword: 'kmeans',
      requestTimeoutMs: 2_000,
    });
  });

  describe('segment', () => {
    it('should return one prediction per row', async () => {
      const result = await service.segment({ features: [[-1.14, -1.13, 0.68]] });

      expect(result).toEqual({
        predictions: [{ closestCluster: 0, distanceToCluster: 0.5 }],
        endpoint: 'kmeans-test',
        featuresProcessed: 1,
      });
    });

    it('should send the rows to the endpoint as CSV', async () => {
      await service.segment(EXAMPLE_FEATURES);

      expect(clustering.invocations).toEqual([
        { endpointName: 'kmeans-test', csv: '-1.14,-1.13,0.68\n-1.67,-0.81,-0.22' },
      ]);
    });

    it('should match the endpoint keyword case-insensitively', async () => {
      clustering.endpoints = ['fraud-xgb', 'Customer-KMeans-prod'];

      const result = await service.segment({ features: [[1, 2]] });

      expect(result.endpoint).toBe('Customer-KMeans-prod');
    });

    it('should use the first matching endpoint', async () => {
      clustering.endpoints = ['kmeans-a', 'kmeans-b'];

      expect((await service.segment({ features: [[1]] })).endpoint).toBe('kmeans-a');
    });

    it('should throw NotFoundError when no endpoint matches', async () => {
      clustering.endpoints = ['fraud-xgb'];

      await expect(service.segment({ features: [[1, 2]] })).rejects.toThrow(NotFoundError);
      await expect(service.segment({ features: [[1, 2]] })).rejects.toThrow(
        'No kmeans endpoint found'
      );
      expect(clustering.invocations).toHaveLength(0);
    });

    it('should reject a missing or empty features array', async () => {
      for (const payload of [{}, { features: [] }, { features: 'x' }, null]) {
        await expect(service.segment(payload)).rejects.toThrow('Missing features array');
      }
    });

    it('should reject rows that are not non-empty numeric arrays', async () => {
      const bad = [[[1, 2], []], [[1, 2], [1, 'a']], [[1, 2], 3], [[1, Number.POSITIVE_INFINITY]]];

      for (const features of bad) {
        await expect(service.segment({ features })).rejects.toThrow(InvalidInputError);
      }
      await expect(service.segment({ features: [[1, 2], []] })).rejects.toThrow(
        'features[1] must be a non-empty array of numbers'
      );
    });

    it('should attach an example payload to input errors', async () => {
      const err = await service.segment({}).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.statusCode).toBe(400);
        expect(err.example).toEqual(EXAMPLE_FEATURES);
      }
    });

    it('should validate before calling the endpoint', async () => {
      await expect(service.segment({ features: [] })).rejects.toThrow(InvalidInputError);

      expect(clustering.invocations).toHaveLength(0);
    });

    it('should wrap endpoint listing failures', async () => {
      clustering.listError = new Error('AccessDenied');

      await expect(service.segment({ features: [[1]] })).rejects.toThrow(
        'Could not list clustering endpoints'
      );
    });

    it('should wrap endpoint invocation failures', async () => {
      clustering.invokeError = new Error('ModelError');

      await expect(service.segment({ features: [[1]] })).rejects.toThrow(
        'Clustering endpoint invocation failed'
      );
    });

    it('should reject an unexpected endpoint response', async () => {
      clustering.invokeReply = { labels: [1, 2] };

      const err = await service.segment({ features: [[1]] }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(UpstreamError);
      if (err instanceof UpstreamError) {
        expect(err.message).toBe('Clustering endpoint returned an unexpected response');
        expect(err.statusCode).toBe(500);
      }
    });
  });

  describe('toCsv', () => {
    it('should join values with commas and rows with newlines', () => {
      expect(toCsv([[1, 2.5], [-3, 0]])).toBe('1,2.5\n-3,0');
    });
  });
});
