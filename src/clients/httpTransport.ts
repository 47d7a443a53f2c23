import { fetch as undiciFetch, ProxyAgent, type Dispatcher } from "undici";

export interface TransportRequest {
  headers: Record<string, string>;
  signal: AbortSignal;
  proxyUrl: string | null;
}

export interface TransportResponse {
  url: string;
  status: number;
  contentType: string;
  setCookies: string[];
  body: string;
}

export interface HttpTransport {
  request(url: string, request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

/**
 * undici-backed transport. Requests through a proxy reuse one ProxyAgent per
 * proxy URL so connections to the proxy are pooled.
 */
export class UndiciTransport implements HttpTransport {
  private readonly agents = new Map<string, ProxyAgent>();

  async request(url: string, request: TransportRequest): Promise<TransportResponse> {
    const res = await undiciFetch(url, {
      headers: request.headers,
      signal: request.signal,
      redirect: "follow",
      dispatcher: this.dispatcherFor(request.proxyUrl)
    });

    return {
      url: res.url || url,
      status: res.status,
      contentType: res.headers.get("content-type") ?? "",
      setCookies: res.headers.getSetCookie(),
      body: await res.text()
    };
  }

  async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private dispatcherFor(proxyUrl: string | null): Dispatcher | undefined {
    if (!proxyUrl) return undefined;

    let agent = this.agents.get(proxyUrl);
    if (!agent) {
      agent = new ProxyAgent(proxyUrl);
      this.agents.set(proxyUrl, agent);
    }
    return agent;
  }
}
