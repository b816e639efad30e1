/**
 * Typed consumer of the upload API, the counterpart of the mobile app's
 * upload manager. Runs on Node 20+ (global fetch / FormData / Blob).
 *
 * ```ts
 * const client = new MediaUploadClient({ baseUrl: "https://media.example.com", apiKey: "test-key" });
 * const item = await client.uploadMedia({
 *   title: "Sunday service",
 *   category: "Sermons",
 *   file: { name: "service.mp3", content: await fs.readFile("service.mp3"), type: "audio/mpeg" },
 * });
 * ```
 */

import type { Envelope } from "../interfaces/envelope.interface";

export interface ClientMediaItem {
  id: number;
  title: string;
  category: string;
  file_path: string;
  url: string;
  uploaded_at: string;
}

export interface ClientFile {
  name: string;
  content: Uint8Array;
  type?: string;
}

export interface MediaUploadClientOptions {
  baseUrl: string;
  apiKey: string;
  fetch?: typeof fetch;
}

export class MediaUploadClientError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "MediaUploadClientError";
  }
}

function isEnvelope(value: unknown): value is Envelope<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "success") === "boolean" &&
    typeof Reflect.get(value, "message") === "string"
  );
}

function isMediaItem(value: unknown): value is ClientMediaItem {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "id") === "number" &&
    typeof Reflect.get(value, "file_path") === "string"
  );
}

function isMediaItemList(value: unknown): value is ClientMediaItem[] {
  return Array.isArray(value) && value.every(isMediaItem);
}

export class MediaUploadClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor({ baseUrl, apiKey, fetch: fetchImpl = fetch }: MediaUploadClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.apiKey = apiKey;
    this.fetchImpl = fetchImpl;
  }

  async uploadMedia(input: {
    title: string;
    category: string;
    file: ClientFile;
  }): Promise<ClientMediaItem> {
    const form = new FormData();
    form.append("title", input.title);
    form.append("category", input.category);
    form.append(
      "file",
      new Blob([input.file.content], { type: input.file.type ?? "application/octet-stream" }),
      input.file.name
    );

    return this.request(
      "/mobile/upload",
      { method: "POST", headers: { "X-API-Key": this.apiKey }, body: form },
      isMediaItem
    );
  }

  listContent(filter: { category?: string; q?: string } = {}): Promise<ClientMediaItem[]> {
    const params = new URLSearchParams();
    if (filter.category) params.set("category", filter.category);
    if (filter.q) params.set("q", filter.q);
    const query = params.toString();

    return this.request(`/content${query ? `?${query}` : ""}`, { method: "GET" }, isMediaItemList);
  }

  private async request<T>(
    path: string,
    init: RequestInit,
    isPayload: (data: unknown) => data is T
  ): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    const body: unknown = await response.json().catch(() => null);

    if (!isEnvelope(body)) {
      throw new MediaUploadClientError(response.status, `Unexpected response (HTTP ${response.status})`);
    }
    if (!response.ok || !body.success) {
      throw new MediaUploadClientError(response.status, body.message);
    }
    if (!isPayload(body.data)) {
      throw new MediaUploadClientError(response.status, "Unexpected response payload");
    }
    return body.data;
  }
}
