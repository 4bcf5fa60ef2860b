import { describe, expect, it } from "vitest";
import { FarmerCodeSchema, UpdateFarmerProfileInputSchema } from "./farmer";

describe("UpdateFarmerProfileInputSchema", () => {
  it("accepts a partial update and trims text fields", () => {
    const parsed = UpdateFarmerProfileInputSchema.parse({ district: "  Nashik ", language: "mr" });
    expect(parsed).toEqual({ district: "Nashik", language: "mr" });
  });

  it("allows clearing the email and village with null", () => {
    const parsed = UpdateFarmerProfileInputSchema.parse({ email: null, village: null });
    expect(parsed).toEqual({ email: null, village: null });
  });

  it("rejects an empty update", () => {
    const result = UpdateFarmerProfileInputSchema.safeParse({});
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe("At least one profile field is required");
  });

  it("applies the registration name rule", () => {
    expect(UpdateFarmerProfileInputSchema.safeParse({ fullName: "R2" }).success).toBe(false);
  });
});

describe("FarmerCodeSchema", () => {
  it("requires AGRO followed by eight digits", () => {
    expect(FarmerCodeSchema.safeParse("AGRO00000012").success).toBe(true);
    expect(FarmerCodeSchema.safeParse("AGRO12").success).toBe(false);
  });
});
