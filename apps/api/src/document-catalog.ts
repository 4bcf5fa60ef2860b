/**
 * Document catalog loader.
 *
 * The catalog (document-catalog/document-types.json) holds the heuristic
 * tables for every document type: requirement keywords, the field patterns
 * tried in order, string limits and the required fields used for confidence
 * scoring. It is validated once and frozen; callers receive it explicitly.
 */
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  DOCUMENT_TYPES,
  DocumentTypeEnum,
  VALIDATION_TYPES,
  type DocumentType,
} from "@agroscheme/shared";
import { logInfo } from "./logger";

export const FieldKindEnum = z.enum(["string", "number", "date", "digits", "upper_alnum"]);

export type FieldKind = z.infer<typeof FieldKindEnum>;

function compiles(source: string, flags: string | undefined): boolean {
  try {
    new RegExp(source, flags);
    return true;
  } catch {
    return false;
  }
}

const FieldPatternSchema = z
  .object({
    source: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/).optional(),
    value: z.string().min(1).optional(),
  })
  .refine((pattern) => compiles(pattern.source, pattern.flags), {
    message: "Pattern does not compile",
  });

const FieldDefinitionSchema = z.object({
  kind: FieldKindEnum,
  maxDigits: z.number().int().positive().optional(),
  /** Format check applied after cleaning; a failing value stays unparsed. */
  validator: z.enum(VALIDATION_TYPES).optional(),
  patterns: z.array(FieldPatternSchema).min(1),
});

const DocumentTypeDefinitionSchema = z
  .object({
    type: DocumentTypeEnum,
    keywords: z.array(z.string().min(1)),
    maxStringLength: z.number().int().positive(),
    requiredFields: z.array(z.string().min(1)),
    fields: z.record(z.string().min(1), FieldDefinitionSchema),
  })
  .superRefine((definition, ctx) => {
    for (const field of definition.requiredFields) {
      if (!(field in definition.fields)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["requiredFields"],
          message: `Required field '${field}' has no definition`,
        });
      }
    }
  });

const DocumentCatalogFileSchema = z
  .object({
    version: z.number().int().positive(),
    documentTypes: z.array(DocumentTypeDefinitionSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<DocumentType>();
    for (const definition of file.documentTypes) {
      if (seen.has(definition.type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["documentTypes"],
          message: `Duplicate document type '${definition.type}'`,
        });
      }
      seen.add(definition.type);
    }
    for (const type of DOCUMENT_TYPES) {
      if (!seen.has(type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["documentTypes"],
          message: `Missing document type '${type}'`,
        });
      }
    }
  });

export type FieldPattern = z.infer<typeof FieldPatternSchema>;
export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>;
export type DocumentTypeDefinition = z.infer<typeof DocumentTypeDefinitionSchema>;

export interface DocumentCatalog {
  readonly version: number;
  /** Definitions in file order; requirement reconciliation follows this order. */
  readonly definitions: readonly DocumentTypeDefinition[];
  get(type: DocumentType): DocumentTypeDefinition;
}

export class DocumentCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocumentCatalogError";
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}

export function parseDocumentCatalog(raw: unknown): DocumentCatalog {
  const result = DocumentCatalogFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new DocumentCatalogError(`Invalid document catalog: ${detail}`);
  }
  const file = deepFreeze(result.data);
  const byType = new Map<DocumentType, DocumentTypeDefinition>(
    file.documentTypes.map((definition) => [definition.type, definition])
  );
  return {
    version: file.version,
    definitions: file.documentTypes,
    get(type) {
      const definition = byType.get(type);
      if (!definition) {
        throw new DocumentCatalogError(`Unknown document type '${type}'`);
      }
      return definition;
    },
  };
}

export function resolveDocumentCatalogPath(): string {
  return (
    process.env.DOCUMENT_CATALOG_PATH ||
    path.resolve(__dirname, "..", "document-catalog", "document-types.json")
  );
}

export function loadDocumentCatalog(filePath = resolveDocumentCatalogPath()): DocumentCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  const catalog = parseDocumentCatalog(raw);
  logInfo("Document catalog loaded", {
    version: catalog.version,
    documentTypes: catalog.definitions.length,
  });
  return catalog;
}

let cachedCatalog: DocumentCatalog | null = null;

/** Process-wide catalog, loaded on first use. */
export function getDocumentCatalog(): DocumentCatalog {
  if (!cachedCatalog) {
    cachedCatalog = loadDocumentCatalog();
  }
  return cachedCatalog;
}
