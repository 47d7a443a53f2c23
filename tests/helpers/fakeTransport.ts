import type { HttpTransport, TransportRequest, TransportResponse } from "../../src/clients/httpTransport";

export const LONG_PAGE = `<html><head><title>S01E01</title></head><body>${"<p>CHUCK: Sit down.</p>".repeat(40)}</body></html>`;

export function page(body: string = LONG_PAGE, overrides: Partial<TransportResponse> = {}): TransportResponse {
  return {
    url: "",
    status: 200,
    contentType: "text/html",
    setCookies: [],
    body,
    ...overrides
  };
}

type Responder = (url: string, request: TransportRequest) => TransportResponse | Error | Promise<TransportResponse | Error>;

/** Records every request and answers from the responder */
export class FakeTransport implements HttpTransport {
  readonly calls: Array<{ url: string; request: TransportRequest }> = [];
  inFlight = 0;
  maxInFlight = 0;
  closed = false;

  constructor(private readonly responder: Responder) {}

  async request(url: string, request: TransportRequest): Promise<TransportResponse> {
    this.calls.push({ url, request });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const result = await this.responder(url, request);
      if (result instanceof Error) throw result;
      return { ...result, url: result.url || url };
    } finally {
      this.inFlight--;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
