import { FetchError } from "../domain/errors.js";

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent?: string;
}

export interface PageFetcher {
  fetchPage(url: string): Promise<string>;
}

const ACCEPT_HEADER = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

function isTextualContentType(contentType: string | null): boolean {
  if (!contentType) return true;
  const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mime.startsWith("text/") || mime.includes("html") || mime.includes("xml");
}

function describeTransportFailure(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici wraps the socket error in `cause`
  const cause = error.cause;
  if (cause && typeof cause === "object" && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return error.message;
}

/**
 * Plain GET of the watched page. No retries here: the next scheduled cycle is
 * the retry.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      redirect: "follow",
      headers: {
        accept: ACCEPT_HEADER,
        ...(options.userAgent ? { "user-agent": options.userAgent } : {}),
      },
      signal: controller.signal,
    });
  } catch (error) {
    clearTimeout(timer);
    if (controller.signal.aborted) {
      throw new FetchError("timeout", `Request timed out after ${options.timeoutMs}ms`, { cause: error });
    }
    throw new FetchError("network", `Network error: ${describeTransportFailure(error)}`, { cause: error });
  }

  try {
    if (!response.ok) {
      throw new FetchError("http_status", `HTTP ${response.status}`, { status: response.status });
    }

    const contentType = response.headers.get("content-type");
    if (!isTextualContentType(contentType)) {
      throw new FetchError("malformed_response", `Unexpected content-type ${contentType ?? ""}`.trim(), {
        status: response.status,
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new FetchError("timeout", `Request timed out after ${options.timeoutMs}ms`, { cause: error });
      }
      throw new FetchError("malformed_response", "Response body could not be read", { cause: error });
    }

    if (!text.trim()) {
      throw new FetchError("malformed_response", "Empty response body", { status: response.status });
    }
    return text;
  } finally {
    clearTimeout(timer);
  }
}

export class HttpPageFetcher implements PageFetcher {
  private readonly options: FetchPageOptions;

  constructor(options: FetchPageOptions) {
    this.options = options;
  }

  fetchPage(url: string): Promise<string> {
    return fetchPage(url, this.options);
  }
}
