import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getClient, query, type TransactionClient } from "./db";
import {
  listFieldSets,
  listPendingDocuments,
  previewExtraction,
  sanitizeStorageSegment,
  uploadFarmerDocument,
  verifyDocument,
} from "./documents";
import { setOcrAdapter, type OcrAdapter } from "./providers/ocr";
import { setStorage, type StorageAdapter } from "./storage";

vi.mock("./db", () => ({
  query: vi.fn(),
  getClient: vi.fn(),
  uniqueViolationConstraint: vi.fn(() => null),
}));

class MemoryStorage implements StorageAdapter {
  name = "memory";
  readonly files = new Map<string, Buffer>();

  async write(key: string, data: Buffer): Promise<void> {
    this.files.set(key, data);
  }

  async read(key: string): Promise<Buffer | null> {
    return this.files.get(key) ?? null;
  }

  async delete(key: string): Promise<void> {
    this.files.delete(key);
  }
}

const UPLOADED_AT = new Date("2026-03-01T09:00:00.000Z");

function scriptedClient(options: { failOn?: string } = {}) {
  const statements: string[] = [];
  const client = {
    query: vi.fn(async (text: string, params: unknown[] = []) => {
      const statement = text.trim().split(/\s+/).slice(0, 3).join(" ");
      statements.push(statement);
      if (options.failOn && statement.startsWith(options.failOn)) {
        throw new Error("disk full");
      }
      if (statement === "INSERT INTO farmer_document") {
        return {
          rows: [
            {
              document_id: params[0],
              farmer_id: params[1],
              document_type: params[2],
              storage_key: params[3],
              original_filename: params[4],
              mime_type: params[5],
              size_bytes: params[6],
              checksum: params[7],
              confidence: String(params[8]),
              uploaded_at: UPLOADED_AT,
              verification_status: "PENDING",
              verification_remarks: null,
              verified_by: null,
              verified_at: null,
            },
          ],
          rowCount: 1,
        };
      }
      return { rows: [], rowCount: 0 };
    }),
    release: vi.fn(),
  };
  vi.mocked(getClient).mockResolvedValue(client as unknown as TransactionClient);
  return { client, statements };
}

const aadhaarText = ["Name: Ramesh Kumar Patil", "DOB: 15/08/1985", "Male", "2345 6789 0124"].join("\n");

describe("previewExtraction", () => {
  it("extracts without touching storage or the database", () => {
    const result = previewExtraction("income_certificate", "Annual Income: Rs. 1,20,000");

    expect(result.fields.annual_income).toBe(120000);
    expect(getClient).not.toHaveBeenCalled();
  });
});

describe("sanitizeStorageSegment", () => {
  it("keeps only the base name with safe characters", () => {
    expect(sanitizeStorageSegment("../../etc/my file.txt", "upload")).toBe("my_file.txt");
  });

  it("falls back for empty names", () => {
    expect(sanitizeStorageSegment("", "upload")).toBe("upload");
  });
});

describe("uploadFarmerDocument", () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    vi.mocked(getClient).mockReset();
    storage = new MemoryStorage();
    setStorage(storage);
    setOcrAdapter(null);
  });

  afterEach(() => {
    setOcrAdapter(null);
  });

  it("stores the file and upserts the field set in one transaction", async () => {
    const { client, statements } = scriptedClient();

    const result = await uploadFarmerDocument({
      farmerId: 7,
      documentType: "aadhaar",
      filename: "aadhaar card.txt",
      mimeType: "text/plain",
      data: Buffer.from(aadhaarText, "utf8"),
    });

    expect(statements).toEqual([
      "BEGIN",
      "INSERT INTO farmer_document",
      "INSERT INTO extracted_field_set",
      "COMMIT",
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(result.extraction.fields).toEqual({
      aadhaar_number: "234567890124",
      full_name: "Ramesh Kumar Patil",
      date_of_birth: "1985-08-15",
      gender: "Male",
    });
    expect(result.document.confidence).toBe(100);
    expect(result.document.original_filename).toBe("aadhaar_card.txt");
    expect(result.document.storage_key).toMatch(/^farmers\/7\/aadhaar\/[0-9a-f-]{36}-aadhaar_card\.txt$/);
    expect(storage.files.get(result.document.storage_key)?.toString("utf8")).toBe(aadhaarText);

    const upsert = client.query.mock.calls[2];
    expect(upsert[1]?.[2]).toBe(JSON.stringify(result.extraction.fields));
  });

  it("produces an empty field set for images under the stub provider", async () => {
    scriptedClient();
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);

    const result = await uploadFarmerDocument({
      farmerId: 7,
      documentType: "pan",
      filename: "pan.png",
      mimeType: "image/png",
      data: png,
    });

    expect(result.extraction.fields).toEqual({});
    expect(result.extraction.confidence).toBe(0);
  });

  it("discards the stored file when OCR fails", async () => {
    scriptedClient();
    const failing: OcrAdapter = {
      name: "FAILING",
      readText: vi.fn(async () => {
        throw new Error("upstream down");
      }),
    };
    setOcrAdapter(failing);

    await expect(
      uploadFarmerDocument({
        farmerId: 7,
        documentType: "aadhaar",
        filename: "a.txt",
        mimeType: "text/plain",
        data: Buffer.from(aadhaarText, "utf8"),
      })
    ).rejects.toThrow("OCR_FAILED");

    expect(storage.files.size).toBe(0);
    expect(getClient).not.toHaveBeenCalled();
  });

  it("rolls back when the field set cannot be written", async () => {
    const { client, statements } = scriptedClient({ failOn: "INSERT INTO extracted_field_set" });

    await expect(
      uploadFarmerDocument({
        farmerId: 7,
        documentType: "aadhaar",
        filename: "a.txt",
        mimeType: "text/plain",
        data: Buffer.from(aadhaarText, "utf8"),
      })
    ).rejects.toThrow("disk full");

    expect(statements[statements.length - 1]).toBe("ROLLBACK");
    expect(client.release).toHaveBeenCalledTimes(1);
    expect([...storage.files.keys()]).toEqual([]);
  });

  it("discards the stored file when the document row cannot be written", async () => {
    scriptedClient({ failOn: "INSERT INTO farmer_document" });

    await expect(
      uploadFarmerDocument({
        farmerId: 7,
        documentType: "aadhaar",
        filename: "a.txt",
        mimeType: "text/plain",
        data: Buffer.from(aadhaarText, "utf8"),
      })
    ).rejects.toThrow("disk full");

    expect(storage.files.size).toBe(0);
  });

  it("keeps the database error when the stored file cannot be removed", async () => {
    scriptedClient({ failOn: "INSERT INTO extracted_field_set" });
    vi.spyOn(storage, "delete").mockRejectedValueOnce(new Error("EACCES"));

    await expect(
      uploadFarmerDocument({
        farmerId: 7,
        documentType: "aadhaar",
        filename: "a.txt",
        mimeType: "text/plain",
        data: Buffer.from(aadhaarText, "utf8"),
      })
    ).rejects.toThrow("disk full");
  });

  it("reports OCR_FAILED even when the stored file cannot be removed", async () => {
    scriptedClient();
    setOcrAdapter({
      name: "FAILING",
      readText: async () => {
        throw new Error("upstream down");
      },
    });
    vi.spyOn(storage, "delete").mockRejectedValueOnce(new Error("EACCES"));

    await expect(
      uploadFarmerDocument({
        farmerId: 7,
        documentType: "aadhaar",
        filename: "a.txt",
        mimeType: "text/plain",
        data: Buffer.from(aadhaarText, "utf8"),
      })
    ).rejects.toThrow("OCR_FAILED");
  });

  it("rejects a PDF whose header is not a PDF", async () => {
    await expect(
      uploadFarmerDocument({
        farmerId: 7,
        documentType: "land_record",
        filename: "land.pdf",
        mimeType: "application/pdf",
        data: Buffer.from("not a pdf"),
      })
    ).rejects.toThrow("MIME_MISMATCH");
    expect(storage.files.size).toBe(0);
  });
});

describe("listFieldSets", () => {
  it("skips rows that no longer validate", async () => {
    vi.mocked(query).mockResolvedValueOnce({
      rows: [
        {
          document_type: "aadhaar",
          fields_jsonb: { full_name: "Ramesh" },
          confidence: "25.00",
          document_id: "doc-1",
          extracted_at: UPLOADED_AT,
        },
        {
          document_type: "ration_card",
          fields_jsonb: {},
          confidence: "0",
          document_id: null,
          extracted_at: UPLOADED_AT,
        },
      ],
      rowCount: 2,
    } as never);

    const fieldSets = await listFieldSets(7);

    expect(fieldSets).toEqual([
      {
        document_type: "aadhaar",
        fields: { full_name: "Ramesh" },
        confidence: 25,
        document_id: "doc-1",
        extracted_at: UPLOADED_AT,
      },
    ]);
  });
});

function documentRow(overrides: Record<string, unknown> = {}) {
  return {
    document_id: "0f8fad5b-d9cb-469f-a165-70867728950e",
    farmer_id: 7,
    document_type: "land_record",
    storage_key: "farmers/7/land_record/0f8fad5b-d9cb-469f-a165-70867728950e-7-12.pdf",
    original_filename: "7-12.pdf",
    mime_type: "application/pdf",
    size_bytes: "2048",
    checksum: "abc123",
    confidence: "50.00",
    uploaded_at: UPLOADED_AT,
    verification_status: "PENDING",
    verification_remarks: null,
    verified_by: null,
    verified_at: null,
    ...overrides,
  };
}

describe("listPendingDocuments", () => {
  beforeEach(() => {
    vi.mocked(query).mockReset();
  });

  it("filters by document type and pages oldest first", async () => {
    vi.mocked(query).mockResolvedValueOnce({ rows: [documentRow()], rowCount: 1 } as never);

    const pending = await listPendingDocuments({ documentType: "land_record", limit: 10, offset: 20 });

    const [sql, params] = vi.mocked(query).mock.calls[0];
    expect(sql).toContain("WHERE verification_status = 'PENDING' AND document_type = $1");
    expect(sql).toContain("ORDER BY uploaded_at ASC LIMIT $2 OFFSET $3");
    expect(params).toEqual(["land_record", 10, 20]);
    expect(pending).toHaveLength(1);
    expect(pending[0].size_bytes).toBe(2048);
    expect(pending[0].confidence).toBe(50);
    expect(pending[0].verification_status).toBe("PENDING");
  });
});

describe("verifyDocument", () => {
  beforeEach(() => {
    vi.mocked(query).mockReset();
  });

  it("stores the decision with the reviewing admin", async () => {
    const verifiedAt = new Date("2026-03-02T10:00:00.000Z");
    vi.mocked(query).mockResolvedValueOnce({
      rows: [documentRow({ verification_status: "REJECTED", verification_remarks: "Blurred scan", verified_by: 1, verified_at: verifiedAt })],
      rowCount: 1,
    } as never);

    const document = await verifyDocument(
      "0f8fad5b-d9cb-469f-a165-70867728950e",
      { status: "REJECTED", remarks: "Blurred scan" },
      1
    );

    expect(vi.mocked(query).mock.calls[0][1]).toEqual([
      "0f8fad5b-d9cb-469f-a165-70867728950e",
      "REJECTED",
      "Blurred scan",
      1,
    ]);
    expect(document?.verification_status).toBe("REJECTED");
    expect(document?.verified_by).toBe(1);
    expect(document?.verified_at).toEqual(verifiedAt);
  });

  it("returns null for an unknown document", async () => {
    vi.mocked(query).mockResolvedValueOnce({ rows: [], rowCount: 0 } as never);

    const document = await verifyDocument("0f8fad5b-d9cb-469f-a165-70867728950e", { status: "VERIFIED" }, 1);

    expect(document).toBeNull();
    expect(vi.mocked(query).mock.calls[0][1]).toEqual(["0f8fad5b-d9cb-469f-a165-70867728950e", "VERIFIED", null, 1]);
  });
});
