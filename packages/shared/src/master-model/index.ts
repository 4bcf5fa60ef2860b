/**
 * AgroScheme shared models: barrel export.
 */

// Primitives
export {
  NonEmptyString,
  ISODate,
  ISODateTime,
  Email,
  NonNegativeAmount,
} from "./primitives";

// Documents
export {
  DocumentTypeEnum,
  DOCUMENT_TYPES,
  ExtractedFieldValueSchema,
  ExtractedFieldSetSchema,
  isDocumentType,
  DocumentVerificationStatusEnum,
  VerifyDocumentInputSchema,
  type DocumentType,
  type DocumentVerificationStatus,
  type VerifyDocumentInput,
  type ExtractedFieldValue,
  type ExtractedFieldSet,
  type FarmerFieldSets,
} from "./documents";

// Schemes
export {
  CRITERION_KEYS,
  SchemeCriteriaSchema,
  SchemeCodeSchema,
  CreateSchemeInputSchema,
  type CriterionKey,
  type SchemeCriteria,
  type CreateSchemeInput,
  type ParsedCreateSchemeInput,
} from "./scheme";

// Applications
export {
  ApplicationStatusEnum,
  ApplicationOriginEnum,
  StatusChangeSchema,
  StatusHistorySchema,
  APPLICATION_STATUS_TRANSITIONS,
  canTransitionStatus,
  MAX_APPROVED_AMOUNT,
  UpdateApplicationStatusInputSchema,
  APPLICATION_ID_PATTERN,
  type ApplicationStatus,
  type ApplicationOrigin,
  type StatusChange,
  type UpdateApplicationStatusInput,
} from "./application";

// Eligibility
export {
  EligibilityVerdictSchema,
  SkippedCriteriaPolicyEnum,
  type EligibilityVerdict,
  type SkippedCriteriaPolicy,
} from "./eligibility";

// Farmers
export {
  FarmerRoleEnum,
  LanguageEnum,
  FarmerRegistrationSchema,
  FarmerCodeSchema,
  UpdateFarmerProfileInputSchema,
  type FarmerRole,
  type FarmerRegistration,
  type UpdateFarmerProfileInput,
} from "./farmer";
