// src/batch/removeBg.ts
import { RemoveBgHttpError, errorMessage } from "../errors.js";

export const REMOVE_BG_ENDPOINT = "https://api.remove.bg/v1.0/removebg";

const MAX_DETAIL_CHARS = 2000;

export type RemovalResult =
  | Readonly<{ ok: true; png: Buffer }>
  | Readonly<{ ok: false; reason: string; detail: string }>;

/** An image ready to send: the name and type the upload carries, and its bytes. */
export type UploadImage = Readonly<{ fileName: string; mimeType: string; bytes: Buffer }>;

export interface BackgroundRemover {
  /** Resolves to PNG bytes of the cutout, or a per-file failure. Throws when the whole run should stop. */
  removeBackground(image: UploadImage): Promise<RemovalResult>;
}

export type RemoveBgClientOptions = Readonly<{
  apiKey: string;
  /** remove.bg `size` parameter: auto, preview, full, ... */
  size?: string;
  timeoutMs?: number;
  endpoint?: string;
  fetch?: typeof fetch;
}>;

async function readErrorDetail(resp: Response): Promise<string> {
  const text = await resp.text().catch(() => "");
  const contentType = resp.headers.get("content-type") ?? "";
  if (contentType.includes("application/json")) {
    try {
      return JSON.stringify(JSON.parse(text) as unknown);
    } catch {
      return text.slice(0, MAX_DETAIL_CHARS);
    }
  }
  return text.slice(0, MAX_DETAIL_CHARS);
}

export class RemoveBgClient implements BackgroundRemover {
  private readonly apiKey: string;
  private readonly size: string;
  private readonly timeoutMs: number;
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  public constructor(opts: RemoveBgClientOptions) {
    this.apiKey = opts.apiKey;
    this.size = opts.size ?? "auto";
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.endpoint = opts.endpoint ?? REMOVE_BG_ENDPOINT;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  public async removeBackground(image: UploadImage): Promise<RemovalResult> {
    const form = new FormData();
    form.append(
      "image_file",
      new Blob([new Uint8Array(image.bytes)], { type: image.mimeType }),
      image.fileName,
    );
    form.append("size", this.size);
    form.append("format", "png");

    let resp: Response;
    try {
      resp = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: { "X-Api-Key": this.apiKey, Accept: "image/png, application/json" },
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      return { ok: false, reason: "removebg_request_failed", detail: errorMessage(err) };
    }

    if (resp.status === 200) {
      return { ok: true, png: Buffer.from(await resp.arrayBuffer()) };
    }

    const detail = await readErrorDetail(resp);
    // 400-403 are about this image or this request (bad file, no credits left for it);
    // anything above means the service itself is refusing, so stop the run.
    if (resp.status >= 404) throw new RemoveBgHttpError(resp.status, detail);
    return { ok: false, reason: `removebg_http_${resp.status}`, detail };
  }
}
