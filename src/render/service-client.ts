/**
 * Diagram service client (PlantUML server over HTTP)
 */

export interface DiagramServiceClient {
  /** Render diagram text to PNG bytes */
  render(source: string): Promise<Uint8Array>;
}

export type DiagramServiceClientFactory = () => DiagramServiceClient;

export class PlantUmlHttpClient implements DiagramServiceClient {
  private readonly endpoint: string;

  constructor(
    server: string,
    private readonly timeoutMs: number,
  ) {
    this.endpoint = `${server.replace(/\/+$/, "")}/png`;
  }

  async render(source: string): Promise<Uint8Array> {
    const response = await fetch(this.endpoint, {
      method: "POST",
      headers: { "Content-Type": "text/plain; charset=utf-8" },
      body: source,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    return new Uint8Array(await response.arrayBuffer());
  }
}
