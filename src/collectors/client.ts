/**
 * Weibo HTTP Client
 *
 * Thin axios wrapper over the three endpoints the harvester reads:
 * the container endpoint (profile and listing) and the post detail page.
 * Container bodies are fetched as text and decoded with decodeJson so
 * large numeric ids stay exact.
 * No retries and no pacing here; UserFeed decides when requests are paced.
 */

import axios from 'axios';
import type { HarvestConfig } from '../types/index.js';
import { decodeJson } from '../utils/json.js';
import { logVerbose } from '../utils/logger.js';

// ============================================
// Types
// ============================================

export type ContainerParams = Record<string, string>;

/**
 * Network boundary. Tests substitute an in-process fake.
 */
export interface WeiboClient {
  /** GET the container endpoint and return the decoded JSON body */
  getContainer(params: ContainerParams): Promise<unknown>;

  /** GET a post's detail page and return the raw HTML */
  getDetailPage(postId: string): Promise<string>;
}

export type ClientConfig = Pick<HarvestConfig, 'apiUrl' | 'detailUrl' | 'timeoutMs' | 'userAgent'>;

// ============================================
// Axios Implementation
// ============================================

function buildHeaders(config: ClientConfig): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json, text/plain, */*',
  };
  if (config.userAgent) {
    headers['User-Agent'] = config.userAgent;
  }
  return headers;
}

export function createWeiboClient(config: ClientConfig): WeiboClient {
  const headers = buildHeaders(config);

  return {
    async getContainer(params: ContainerParams): Promise<unknown> {
      logVerbose(`Request: container ${params.containerid ?? '?'}${params.page ? ` page ${params.page}` : ''}`);
      const response = await axios.get<string>(config.apiUrl, {
        headers,
        params,
        responseType: 'text',
        timeout: config.timeoutMs,
      });
      if (typeof response.data !== 'string') {
        throw new Error(`Container ${params.containerid ?? '?'} did not return text`);
      }
      return decodeJson(response.data);
    },

    async getDetailPage(postId: string): Promise<string> {
      const url = `${config.detailUrl}/${postId}`;
      logVerbose(`Request: detail page ${postId}`);
      const response = await axios.get<string>(url, {
        headers,
        responseType: 'text',
        timeout: config.timeoutMs,
      });
      if (typeof response.data !== 'string') {
        throw new Error(`Detail page ${postId} did not return text`);
      }
      return response.data;
    },
  };
}
