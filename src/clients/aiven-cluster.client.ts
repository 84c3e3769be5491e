/**
 * AivenClusterClient
 *
 * Lists and deletes OpenSearch indices of Aiven services through the Aiven
 * REST API.
 *
 *   GET    /v1/project/{project}/service/{service}/index
 *   DELETE /v1/project/{project}/service/{service}/index/{index_name}
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ClusterClient } from './cluster-client.interface';
import type { IndexInfo } from '../rules/index-rule.interface';

export type HttpClient = Pick<AxiosInstance, 'get' | 'delete'>;

export interface AivenClientOptions {
  apiUrl: string;
  apiToken: string;
  project: string;
}

const indexListSchema = z.object({
  indexes: z.array(
    z.object({
      index_name: z.string(),
      size: z.number().nonnegative(),
      create_time: z.string().optional(),
    })
  ),
});

export function createAivenHttpClient(options: AivenClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.apiUrl,
    timeout: 30000,
    headers: {
      Authorization: `aivenv1 ${options.apiToken}`,
      'Content-Type': 'application/json',
    },
  });
}

export class AivenClusterClient implements ClusterClient {
  readonly name = 'AivenClusterClient';

  private readonly http: HttpClient;

  constructor(
    private options: AivenClientOptions,
    http?: HttpClient
  ) {
    this.http = http ?? createAivenHttpClient(options);
  }

  private indexPath(service: string): string {
    return `/v1/project/${encodeURIComponent(this.options.project)}/service/${encodeURIComponent(service)}/index`;
  }

  async listIndices(service: string): Promise<IndexInfo[]> {
    const response = await this.http.get<unknown>(this.indexPath(service));
    const parsed = indexListSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected index listing for service ${service}: ${parsed.error.message}`);
    }

    return parsed.data.indexes.map((index) => ({
      name: index.index_name,
      sizeBytes: index.size,
      createdAt: index.create_time ? new Date(index.create_time) : undefined,
    }));
  }

  async deleteIndex(service: string, indexName: string): Promise<void> {
    await this.http.delete(`${this.indexPath(service)}/${encodeURIComponent(indexName)}`);
  }
}
