import { z } from "zod";
import { resilientFetch } from "../http-client";
import { logWarn } from "../logger";
import { parsePositiveIntEnv } from "../runtime-safety";

export interface OcrInput {
  data: Buffer;
  mimeType: string;
  filename: string;
}

export interface OcrAdapter {
  readonly name: string;
  readText(input: OcrInput): Promise<string>;
}

/**
 * Reads plain-text uploads as UTF-8. Images and PDFs yield empty text, so
 * the extractor produces a field set with every required field missing.
 */
export class StubOcrAdapter implements OcrAdapter {
  readonly name = "STUB_OCR";

  async readText(input: OcrInput): Promise<string> {
    if (input.mimeType === "text/plain") {
      return input.data.toString("utf8");
    }
    return "";
  }
}

const OcrResponseSchema = z.object({ text: z.string() });

export class HttpOcrAdapter implements OcrAdapter {
  readonly name = "HTTP_OCR";

  constructor(
    private readonly serviceUrl: string,
    private readonly timeoutMs: number
  ) {}

  async readText(input: OcrInput): Promise<string> {
    const response = await resilientFetch(this.serviceUrl, {
      method: "POST",
      headers: {
        "Content-Type": input.mimeType,
        "X-Filename": encodeURIComponent(input.filename),
      },
      body: input.data,
      timeoutMs: this.timeoutMs,
      maxRetries: 2,
    });
    if (!response.ok) {
      throw new Error(`OCR service responded with HTTP ${response.status}`);
    }
    const parsed = OcrResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("OCR service returned an unexpected body");
    }
    return parsed.data.text;
  }
}

let cachedAdapter: OcrAdapter | null = null;

export function resolveOcrAdapter(): OcrAdapter {
  if (cachedAdapter) return cachedAdapter;

  const configuredProvider = (process.env.OCR_PROVIDER || "stub").trim().toLowerCase();
  switch (configuredProvider) {
    case "stub":
      cachedAdapter = new StubOcrAdapter();
      break;
    case "http": {
      const serviceUrl = process.env.OCR_SERVICE_URL;
      if (!serviceUrl) {
        logWarn("OCR_PROVIDER=http without OCR_SERVICE_URL, using stub adapter");
        cachedAdapter = new StubOcrAdapter();
        break;
      }
      cachedAdapter = new HttpOcrAdapter(serviceUrl, parsePositiveIntEnv("OCR_TIMEOUT_MS", 15_000));
      break;
    }
    default:
      logWarn("Unknown OCR_PROVIDER configured, using stub adapter", {
        provider: configuredProvider,
      });
      cachedAdapter = new StubOcrAdapter();
      break;
  }
  return cachedAdapter;
}

export function setOcrAdapter(adapter: OcrAdapter | null): void {
  cachedAdapter = adapter;
}
