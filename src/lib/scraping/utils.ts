import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { HttpError } from "../errors";

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

// One agent for the whole run, shared by every request
const proxyDispatcher = getProxyDispatcher();

/**
 * Single GET of an HTML page. No retries and no timeout beyond undici's own.
 * Throws HttpError for any non-200 response; network failures propagate as-is.
 */
export async function fetchPage(url: string): Promise<string> {
  const fetchOptions: Parameters<typeof undiciFetch>[1] = {
    headers: {
      "User-Agent": config.getRandomUserAgent(),
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-GB,en;q=0.9",
    },
    dispatcher: proxyDispatcher,
  };

  const response = await undiciFetch(url, fetchOptions);

  if (response.status === 404) {
    throw new HttpError(404, url, `Page not found (404): ${url}`);
  }

  if (response.status !== 200) {
    throw new HttpError(response.status, url);
  }

  return response.text();
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
