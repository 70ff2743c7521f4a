/**
 * HTTP fetching for feeds and images
 *
 * Requests go through axios, which picks up HTTP_PROXY / HTTPS_PROXY / NO_PROXY
 * from the environment. Each request is bounded by a timeout; there is no retry.
 */

import axios from "axios";
import type { NetworkConfig } from "../types";

export interface Fetcher {
  fetchText(url: string): Promise<string>;
  fetchBinary(url: string): Promise<Uint8Array>;
}

const MAX_REDIRECTS = 5;

export function createFetcher(config: NetworkConfig): Fetcher {
  const client = axios.create({
    timeout: config.timeout,
    maxRedirects: MAX_REDIRECTS,
    headers: { "User-Agent": config.userAgent },
  });

  return {
    async fetchText(url: string): Promise<string> {
      const response = await client.get<string>(url, { responseType: "text" });
      return response.data;
    },

    async fetchBinary(url: string): Promise<Uint8Array> {
      const response = await client.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
      });
      return new Uint8Array(response.data);
    },
  };
}
