import { describe, expect, it } from "vitest";

import { RemoveBgHttpError } from "../src/errors.js";
import { REMOVE_BG_ENDPOINT, RemoveBgClient } from "../src/batch/removeBg.js";
import type { UploadImage } from "../src/batch/removeBg.js";

type Call = { url: string; init: RequestInit | undefined };

function inputImage(): UploadImage {
  return { fileName: "cat.jpg", mimeType: "image/jpeg", bytes: Buffer.from("jpeg bytes") };
}

function fakeFetch(respond: () => Response | Promise<Response>): { fetch: typeof fetch; calls: Call[] } {
  const calls: Call[] = [];
  const fake: typeof fetch = async (input: string | URL | Request, init?: RequestInit) => {
    calls.push({ url: String(input), init });
    return respond();
  };
  return { fetch: fake, calls };
}

describe("RemoveBgClient", () => {
  it("uploads the image bytes with the key, size and png format", async () => {
    const cutout = new Uint8Array([1, 2, 3]);
    const { fetch, calls } = fakeFetch(() => new Response(cutout, { status: 200 }));
    const client = new RemoveBgClient({ apiKey: "test-secret", size: "preview", fetch });

    const result = await client.removeBackground(inputImage());

    expect(result).toEqual({ ok: true, png: Buffer.from([1, 2, 3]) });
    expect(calls).toHaveLength(1);

    const call = calls[0]!;
    expect(call.url).toBe(REMOVE_BG_ENDPOINT);
    expect(call.init?.method).toBe("POST");
    expect(new Headers(call.init?.headers).get("X-Api-Key")).toBe("test-secret");

    const body = call.init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect(body.get("size")).toBe("preview");
    expect(body.get("format")).toBe("png");

    const file = body.get("image_file");
    expect(file).toBeInstanceOf(Blob);
    if (!(file instanceof Blob)) return;
    expect(file.type).toBe("image/jpeg");
    expect(file instanceof File ? file.name : undefined).toBe("cat.jpg");
    expect(await file.text()).toBe("jpeg bytes");
  });

  it("defaults the size to auto", async () => {
    const { fetch, calls } = fakeFetch(() => new Response(new Uint8Array(0)));
    await new RemoveBgClient({ apiKey: "test-secret", fetch }).removeBackground(inputImage());

    const body = calls[0]?.init?.body;
    expect(body instanceof FormData ? body.get("size") : undefined).toBe("auto");
  });

  it("treats 402 as a per-file failure with the JSON error as detail", async () => {
    const { fetch } = fakeFetch(
      () =>
        new Response(JSON.stringify({ errors: [{ title: "Insufficient credits" }] }, null, 2), {
          status: 402,
          headers: { "content-type": "application/json" },
        }),
    );
    const client = new RemoveBgClient({ apiKey: "test-secret", fetch });

    expect(await client.removeBackground(inputImage())).toEqual({
      ok: false,
      reason: "removebg_http_402",
      detail: '{"errors":[{"title":"Insufficient credits"}]}',
    });
  });

  it("keeps plain-text error bodies as they are", async () => {
    const { fetch } = fakeFetch(() => new Response("image too small", { status: 400 }));
    const client = new RemoveBgClient({ apiKey: "test-secret", fetch });

    expect(await client.removeBackground(inputImage())).toEqual({
      ok: false,
      reason: "removebg_http_400",
      detail: "image too small",
    });
  });

  it("maps network errors to removebg_request_failed", async () => {
    const { fetch } = fakeFetch(() => Promise.reject(new Error("socket hang up")));
    const client = new RemoveBgClient({ apiKey: "test-secret", fetch });

    expect(await client.removeBackground(inputImage())).toEqual({
      ok: false,
      reason: "removebg_request_failed",
      detail: "socket hang up",
    });
  });

  it("throws on server-side statuses so the run stops", async () => {
    const { fetch } = fakeFetch(() => new Response("boom", { status: 500 }));
    const client = new RemoveBgClient({ apiKey: "test-secret", fetch });

    const run = client.removeBackground(inputImage());
    await expect(run).rejects.toBeInstanceOf(RemoveBgHttpError);
    await expect(run).rejects.toThrow("remove.bg HTTP 500: boom");
  });
});
