/**
 * Farmer registration and profile inputs.
 */
import { z } from "zod";
import { Email, NonEmptyString } from "./primitives";
import { validateMobile, validateName } from "../validation";

export const FarmerRoleEnum = z.enum(["FARMER", "ADMIN"]);

export type FarmerRole = z.infer<typeof FarmerRoleEnum>;

export const LanguageEnum = z.enum(["en", "hi", "mr"]);

const MobileNumber = z
  .string()
  .transform((value) => value.replace(/\D/g, ""))
  .refine((value) => validateMobile(value) === null, { message: "validation.mobile" });

const PersonName = NonEmptyString.max(120).refine((value) => validateName(value) === null, {
  message: "validation.name_min",
});

export const FarmerRegistrationSchema = z.object({
  fullName: PersonName,
  mobileNumber: MobileNumber,
  email: Email.optional(),
  password: z.string().min(8).max(128),
  state: NonEmptyString.max(100),
  district: NonEmptyString.max(100),
  village: z.string().trim().max(100).optional(),
  language: LanguageEnum.default("en"),
  autoApplyEnabled: z.boolean().default(true),
});

export type FarmerRegistration = z.output<typeof FarmerRegistrationSchema>;

export const FarmerCodeSchema = z.string().regex(/^AGRO\d{8}$/);

/** Fields a farmer may change on their own profile. Mobile number and role are fixed. */
export const UpdateFarmerProfileInputSchema = z
  .object({
    fullName: PersonName,
    email: Email.nullable(),
    state: NonEmptyString.max(100),
    district: NonEmptyString.max(100),
    village: z.string().trim().max(100).nullable(),
    language: LanguageEnum,
  })
  .partial()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one profile field is required",
  });

export type UpdateFarmerProfileInput = z.output<typeof UpdateFarmerProfileInputSchema>;
