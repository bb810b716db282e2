/**
 * Managed clustering inference interface (k-means endpoints).
 */

export interface IClusteringProvider {
  /** Names of endpoints currently able to serve requests. */
  listEndpoints(signal?: AbortSignal): Promise<string[]>;

  /** Send CSV rows to an endpoint and return its decoded JSON reply. */
  invoke(endpointName: string, csv: string, signal?: AbortSignal): Promise<unknown>;
}
