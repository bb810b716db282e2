/**
 * SageMaker clustering provider.
 * Lists in-service endpoints and invokes them with text/csv payloads.
 */

import { ListEndpointsCommand, SageMakerClient } from '@aws-sdk/client-sagemaker';
import { InvokeEndpointCommand, SageMakerRuntimeClient } from '@aws-sdk/client-sagemaker-runtime';
import type { IClusteringProvider } from './IClusteringProvider.js';

const MAX_LIST_PAGES = 10;

export class SageMakerClusteringProvider implements IClusteringProvider {
  readonly control: SageMakerClient;
  readonly runtime: SageMakerRuntimeClient;

  constructor(opts: {
    region: string;
    control?: SageMakerClient;
    runtime?: SageMakerRuntimeClient;
  }) {
    this.control = opts.control ?? new SageMakerClient({ region: opts.region });
    this.runtime = opts.runtime ?? new SageMakerRuntimeClient({ region: opts.region, maxAttempts: 1 });
  }

  async listEndpoints(signal?: AbortSignal): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const response = await this.control.send(
        new ListEndpointsCommand({ StatusEquals: 'InService', NextToken: nextToken }),
        { abortSignal: signal }
      );

      for (const endpoint of response.Endpoints ?? []) {
        if (endpoint.EndpointName) names.push(endpoint.EndpointName);
      }

      nextToken = response.NextToken;
      if (!nextToken) break;
    }

    return names;
  }

  async invoke(endpointName: string, csv: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.runtime.send(
      new InvokeEndpointCommand({
        EndpointName: endpointName,
        ContentType: 'text/csv',
        Accept: 'application/json',
        Body: new TextEncoder().encode(csv),
      }),
      { abortSignal: signal }
    );

    if (!response.Body) {
      throw new Error(`Endpoint ${endpointName} returned an empty body`);
    }

    return JSON.parse(new TextDecoder().decode(response.Body));
  }
}
