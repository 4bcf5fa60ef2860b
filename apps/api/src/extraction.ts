/**
 * Document field extraction.
 *
 * Each document type gets one extractor, built once from the catalog and
 * looked up by type. An extractor finds raw matches (first matching pattern
 * wins per field), cleans them into typed outcomes, and reports the fields
 * that count towards confidence. The module performs no I/O.
 */
import {
  validateField,
  type DocumentType,
  type ExtractedFieldSet,
  type ExtractedFieldValue,
} from "@agroscheme/shared";
import type {
  DocumentCatalog,
  DocumentTypeDefinition,
  FieldDefinition,
  FieldKind,
} from "./document-catalog";
import {
  cleanDigits,
  cleanString,
  cleanUpperAlnum,
  normalizeDate,
  parseNumber,
  parsed,
  roundTo,
  unparsed,
  type FieldOutcome,
} from "./field-parsers";

export const BASELINE_CONFIDENCE = 80;

/** Single conversion constant, applied in both directions. */
export const ACRES_PER_HECTARE = 2.47;

export type RawFields = Readonly<Record<string, string>>;

export interface CleanedField {
  readonly kind: FieldKind;
  readonly outcome: FieldOutcome<string | number>;
}

export type CleanedFields = Readonly<Record<string, CleanedField>>;

export interface DocumentExtractor {
  readonly documentType: DocumentType;
  extract(text: string): RawFields;
  clean(fields: RawFields): CleanedFields;
  requiredFields(): ReadonlySet<string>;
}

export type ExtractorRegistry = ReadonlyMap<DocumentType, DocumentExtractor>;

export interface ExtractionResult {
  documentType: DocumentType;
  fields: ExtractedFieldSet;
  confidence: number;
  /** Fields found in the text whose value could not be parsed. */
  unparsedFields: string[];
}

interface CompiledPattern {
  regex: RegExp;
  value?: string;
}

interface CompiledField {
  name: string;
  definition: FieldDefinition;
  patterns: CompiledPattern[];
}

/** Demotes a parsed value that fails the field's format check. */
function validateOutcome(
  definition: FieldDefinition,
  outcome: FieldOutcome<string | number>
): FieldOutcome<string | number> {
  if (!definition.validator || !outcome.parsed) return outcome;
  const value = String(outcome.value);
  return validateField(value, definition.validator) === null ? outcome : unparsed(value);
}

export class PatternExtractor implements DocumentExtractor {
  readonly documentType: DocumentType;
  private readonly fields: CompiledField[];
  private readonly required: ReadonlySet<string>;

  constructor(protected readonly definition: DocumentTypeDefinition) {
    this.documentType = definition.type;
    this.required = new Set(definition.requiredFields);
    this.fields = Object.entries(definition.fields).map(([name, fieldDefinition]) => ({
      name,
      definition: fieldDefinition,
      patterns: fieldDefinition.patterns.map((pattern) => ({
        regex: new RegExp(pattern.source, pattern.flags),
        value: pattern.value,
      })),
    }));
  }

  extract(text: string): RawFields {
    const raw: Record<string, string> = {};
    for (const field of this.fields) {
      for (const pattern of field.patterns) {
        const match = pattern.regex.exec(text);
        if (!match) continue;
        const captured = pattern.value ?? match[1] ?? match[0];
        if (captured.trim().length === 0) continue;
        raw[field.name] = captured;
        break;
      }
    }
    return raw;
  }

  clean(fields: RawFields): CleanedFields {
    const cleaned: Record<string, CleanedField> = {};
    for (const field of this.fields) {
      const raw = fields[field.name];
      if (raw === undefined) continue;
      const outcome = this.cleanValue(field.definition, raw);
      if (outcome) {
        cleaned[field.name] = {
          kind: field.definition.kind,
          outcome: validateOutcome(field.definition, outcome),
        };
      }
    }
    return cleaned;
  }

  requiredFields(): ReadonlySet<string> {
    return this.required;
  }

  /** Returns null when nothing usable is left after cleaning. */
  private cleanValue(
    definition: FieldDefinition,
    raw: string
  ): FieldOutcome<string | number> | null {
    const maxLength = this.definition.maxStringLength;
    switch (definition.kind) {
      case "number":
        return parseNumber(raw);
      case "date":
        return normalizeDate(raw);
      case "digits": {
        const digits = cleanDigits(raw, definition.maxDigits);
        return digits ? parsed(digits) : null;
      }
      case "upper_alnum": {
        const value = cleanUpperAlnum(raw, maxLength);
        return value ? parsed(value) : null;
      }
      case "string": {
        const value = cleanString(raw, maxLength);
        return value ? parsed(value) : null;
      }
    }
  }
}

function parsedNumber(field: CleanedField | undefined): number | null {
  if (!field || !field.outcome.parsed) return null;
  return typeof field.outcome.value === "number" ? field.outcome.value : null;
}

/**
 * Land records fill in whichever of acres / hectares is missing from the
 * other, using ACRES_PER_HECTARE both ways and rounding to 4 decimals.
 */
export class LandRecordExtractor extends PatternExtractor {
  clean(fields: RawFields): CleanedFields {
    const cleaned = super.clean(fields);
    const acres = parsedNumber(cleaned.land_area_acres);
    const hectares = parsedNumber(cleaned.land_area_hectares);

    if (acres === null && hectares !== null) {
      return {
        ...cleaned,
        land_area_acres: { kind: "number", outcome: parsed(roundTo(hectares * ACRES_PER_HECTARE, 4)) },
      };
    }
    if (hectares === null && acres !== null) {
      return {
        ...cleaned,
        land_area_hectares: { kind: "number", outcome: parsed(roundTo(acres / ACRES_PER_HECTARE, 4)) },
      };
    }
    return cleaned;
  }
}

export function createExtractorRegistry(catalog: DocumentCatalog): ExtractorRegistry {
  const registry = new Map<DocumentType, DocumentExtractor>();
  for (const definition of catalog.definitions) {
    const extractor =
      definition.type === "land_record"
        ? new LandRecordExtractor(definition)
        : new PatternExtractor(definition);
    registry.set(definition.type, extractor);
  }
  return registry;
}

/** Unparsed numbers become 0; unparsed dates keep their first 10 characters. */
export function serializeField(field: CleanedField): ExtractedFieldValue {
  if (field.outcome.parsed) return field.outcome.value;
  if (field.kind === "number") return 0;
  if (field.kind === "date") return field.outcome.raw.trim().slice(0, 10);
  return field.outcome.raw;
}

export function computeConfidence(cleaned: CleanedFields, required: ReadonlySet<string>): number {
  if (required.size === 0) return BASELINE_CONFIDENCE;
  let populated = 0;
  for (const name of required) {
    if (cleaned[name]?.outcome.parsed) populated++;
  }
  return Math.min(100, roundTo((populated / required.size) * 100, 2));
}

export function extractDocumentFields(
  registry: ExtractorRegistry,
  documentType: DocumentType,
  text: string
): ExtractionResult {
  const extractor = registry.get(documentType);
  if (!extractor) {
    throw new Error("UNSUPPORTED_DOCUMENT_TYPE");
  }
  const cleaned = extractor.clean(extractor.extract(text));

  const fields: ExtractedFieldSet = {};
  const unparsedFields: string[] = [];
  for (const [name, field] of Object.entries(cleaned)) {
    fields[name] = serializeField(field);
    if (!field.outcome.parsed) unparsedFields.push(name);
  }

  return {
    documentType,
    fields,
    confidence: computeConfidence(cleaned, extractor.requiredFields()),
    unparsedFields,
  };
}
