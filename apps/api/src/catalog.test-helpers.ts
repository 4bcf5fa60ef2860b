import { DOCUMENT_TYPES, type DocumentType, type ValidationType } from "@agroscheme/shared";
import { parseDocumentCatalog, type DocumentCatalog } from "./document-catalog";

type DefinitionOverride = {
  keywords?: string[];
  maxStringLength?: number;
  requiredFields?: string[];
  noteValidator?: ValidationType;
};

/**
 * Builds a small catalog where every type extracts one `note` field from
 * "Note: ..." lines and is recognised by its own type name as keyword.
 */
export function buildTestCatalog(
  overrides: Partial<Record<DocumentType, DefinitionOverride>> = {}
): DocumentCatalog {
  return parseDocumentCatalog({
    version: 1,
    documentTypes: DOCUMENT_TYPES.map((type) => ({
      type,
      keywords: overrides[type]?.keywords ?? [type.replace(/_/g, " ")],
      maxStringLength: overrides[type]?.maxStringLength ?? 200,
      requiredFields: overrides[type]?.requiredFields ?? ["note"],
      fields: {
        note: {
          kind: "string",
          validator: overrides[type]?.noteValidator,
          patterns: [{ source: "Note:\\s*([^\\n]+)" }],
        },
      },
    })),
  });
}
