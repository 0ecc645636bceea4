import { z } from 'zod';
import { SessionClient } from '../client/sessionClient.js';
import { StreamClient } from '../client/streamClient.js';
import { fetchHealth, fetchVersion } from '../client/proxyInfo.js';
import { buildInitializedNotification } from '../client/protocol.js';
import type {
  ClientOptions,
  JsonRpcResponse,
  SseEvent,
} from '../types/index.js';
import { output as defaultOutput } from '../utils/output.js';
import type { OutputService } from '../utils/output.js';

export const DEFAULT_FETCH_URL = 'https://example.com';

// Tool call results can be whole web pages
const MAX_PREVIEW_LENGTH = 500;

const ToolsResultSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string().optional(),
    })
  ),
});

type ToolSummary = z.infer<typeof ToolsResultSchema>['tools'][number];

function extractTools(response: JsonRpcResponse): ToolSummary[] {
  const parsed = ToolsResultSchema.safeParse(response.result);
  return parsed.success ? parsed.data.tools : [];
}

/**
 * CLI handlers: each one runs a complete workflow against the proxy and
 * reports through the OutputService
 */
export class CliHandlers {
  private readonly options: ClientOptions;
  private readonly out: OutputService;

  constructor(options: ClientOptions, out: OutputService = defaultOutput) {
    this.options = options;
    this.out = out;
  }

  /**
   * Create a session, initialize, list tools and call the fetch tool
   */
  async runSession(fetchUrl: string = DEFAULT_FETCH_URL): Promise<void> {
    const client = new SessionClient(this.options);

    const sessionId = await client.createSession();
    this.out.writeSuccess(`Created session: ${sessionId}`);

    const initResponse = await client.initialize();
    this.out.writeJsonBlock('Initialize response', initResponse);

    const toolsResponse = await client.listTools();
    this.out.writeJsonBlock('Tools', toolsResponse);

    const fetchResponse = await client.fetchUrl(fetchUrl);
    this.writePreview('Fetch response', fetchResponse);
  }

  async listTools(): Promise<void> {
    const client = new SessionClient(this.options);
    await client.createSession();

    const initResponse = await client.initialize();
    if (initResponse.error) {
      this.out.writeJsonBlock('Initialize response', initResponse);
      return;
    }
    await client.notify(buildInitializedNotification());

    const response = await client.listTools();
    if (response.error) {
      this.out.writeJsonBlock('Tools', response);
      return;
    }

    const tools = extractTools(response);
    if (tools.length === 0) {
      this.out.writeWarning('Server reported no tools');
      return;
    }
    this.out.writeTable(
      ['name', 'description'],
      tools.map((tool) => [tool.name, tool.description ?? ''])
    );
  }

  /**
   * Obtain a session from the stream endpoint and send `initialize` to it
   */
  async sendInitialize(): Promise<void> {
    const client = new StreamClient(this.options);
    try {
      const sessionId = await client.openStream();
      this.out.writeSuccess(`Got session ID: ${sessionId}`);

      const response = await client.initialize();
      this.out.writeJsonBlock('Response', response);
    } finally {
      await client.close();
    }
  }

  /**
   * Print stream events until the first one named `untilEvent`
   */
  async listen(untilEvent: string): Promise<number> {
    const client = new StreamClient(this.options);
    try {
      const sessionId = await client.openStream();
      this.out.writeSuccess(`Listening for SSE events (session ${sessionId})`);

      let count = 0;
      for await (const event of client.consumeUntil(untilEvent)) {
        count++;
        this.writeEvent(event);
      }
      return count;
    } finally {
      await client.close();
    }
  }

  async health(): Promise<void> {
    this.out.writeJson(await fetchHealth(this.options));
  }

  async version(): Promise<void> {
    this.out.writeJson(await fetchVersion(this.options));
  }

  private writeEvent(event: SseEvent): void {
    if (this.out.outputFormat === 'json') {
      this.out.writeLine(
        JSON.stringify({
          event: event.event,
          id: event.id,
          data: event.json ?? event.data,
        })
      );
      return;
    }

    this.out.writeLine(`Event: ${event.event}`);
    this.out.writeLine(`Data: ${event.data}`);
    if (event.json !== undefined) {
      this.out.writeLine(`Parsed: ${JSON.stringify(event.json, null, 2)}`);
    }
  }

  private writePreview(label: string, data: unknown): void {
    const text = JSON.stringify(data, null, 2);
    if (this.out.outputFormat === 'json' || text.length <= MAX_PREVIEW_LENGTH) {
      this.out.writeJsonBlock(label, data);
      return;
    }
    this.out.writeLine(`${label}:`);
    this.out.writeLine(`${text.substring(0, MAX_PREVIEW_LENGTH)}...`);
  }
}
