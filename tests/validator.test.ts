// ============================================
// Input Validator Tests
// ============================================

import { describe, it, expect, vi } from "vitest";
import { InputValidator, type ValidationSchema } from "../src/validation/validator.js";
import { detectThreat } from "../src/validation/patterns.js";
import { collectStrings, sanitizeString, sanitizeValue } from "../src/validation/sanitize.js";
import type { ApiError } from "../src/lib/errors.js";

const SCREENING: ValidationSchema = { required: ["disease", "symptoms"] };

function failure(result: ReturnType<InputValidator["validate"]>): ApiError {
  if (result.ok) {
    throw new Error(`expected a failure, got ${JSON.stringify(result.value)}`);
  }
  return result.error;
}

function success(result: ReturnType<InputValidator["validate"]>): Record<string, unknown> {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

// ============================================
// Required fields and shape
// ============================================

describe("InputValidator.validate", () => {
  const validator = new InputValidator();

  it("accepts a well-formed payload", () => {
    const value = success(validator.validate({ disease: "flu", symptoms: ["fever", "cough"] }, SCREENING));

    expect(value).toEqual({ disease: "flu", symptoms: ["fever", "cough"] });
  });

  it("parses a JSON string body", () => {
    const value = success(validator.validate('{"disease":"flu","symptoms":["fever"]}', SCREENING));

    expect(value).toEqual({ disease: "flu", symptoms: ["fever"] });
  });

  it("parses a Buffer body", () => {
    const value = success(validator.validate(Buffer.from('{"disease":"flu","symptoms":["fever"]}'), SCREENING));

    expect(value.disease).toBe("flu");
  });

  it("reports the first missing required field", () => {
    const error = failure(validator.validate({ symptoms: ["fever"] }, SCREENING));

    expect(error.kind).toBe("ValidationError");
    expect(error.message).toBe("Missing required field: disease");
    expect(error.record.field).toBe("disease");
    expect(error.status).toBe(400);
  });

  it("treats null as missing", () => {
    const error = failure(validator.validate({ disease: null, symptoms: ["fever"] }, SCREENING));

    expect(error.message).toBe("Missing required field: disease");
  });

  it("rejects an empty list for a required field", () => {
    const error = failure(validator.validate({ disease: "flu", symptoms: [] }, SCREENING));

    expect(error.kind).toBe("ValidationError");
    expect(error.record.field).toBe("symptoms");
    expect(error.message).toBe('Field "symptoms" must not be empty');
  });

  it("rejects a blank string for a required field", () => {
    const error = failure(validator.validate({ disease: "   ", symptoms: ["fever"] }, SCREENING));

    expect(error.message).toBe('Field "disease" must not be empty');
  });

  it("accepts zero and false as present values", () => {
    const schema: ValidationSchema = { required: ["prior", "includeRecommendation"] };

    const value = success(validator.validate({ prior: 0, includeRecommendation: false }, schema));

    expect(value).toEqual({ prior: 0, includeRecommendation: false });
  });

  it.each([
    ["invalid JSON", "{not json", "Request body must be valid JSON"],
    ["a JSON array", "[1,2]", "Request body must be a JSON object"],
    ["a JSON scalar", "42", "Request body must be a JSON object"],
    ["an empty string", "", "Request body is empty"],
    ["no body", undefined, "Request body is empty"],
  ])("rejects %s as malformed", (_label, body, message) => {
    const error = failure(validator.validate(body, SCREENING));

    expect(error.kind).toBe("MalformedRequest");
    expect(error.message).toBe(message);
    expect(error.status).toBe(400);
  });

  it("rejects unknown fields when the schema asks for it", () => {
    const schema: ValidationSchema = { required: ["a"], optional: ["b"], rejectUnknown: true };

    expect(success(validator.validate({ a: "x", b: "y" }, schema))).toEqual({ a: "x", b: "y" });

    const error = failure(validator.validate({ a: "x", c: "y" }, schema));
    expect(error.kind).toBe("ValidationError");
    expect(error.message).toBe('Field "c" is not allowed');
    expect(error.record.field).toBe("c");
  });
});

// ============================================
// Attack signatures
// ============================================

describe("InputValidator threat detection", () => {
  const validator = new InputValidator();

  it("rejects a script tag as a security violation on its field", () => {
    const security = { logSecurityEvent: vi.fn() };

    const error = failure(
      validator.validate({ disease: "<script>alert(1)</script>", symptoms: ["fever"] }, SCREENING, security)
    );

    expect(error.kind).toBe("SecurityViolation");
    expect(error.record.field).toBe("disease");
    expect(error.message).toBe("Potential XSS attack detected in disease");
    expect(security.logSecurityEvent).toHaveBeenCalledTimes(1);
    expect(security.logSecurityEvent).toHaveBeenCalledWith("xss", "Potential XSS attack detected in disease", {
      stage: "validation",
      field: "disease",
      signature: "script-tag",
    });
  });

  it("rejects SQL injection", () => {
    const security = { logSecurityEvent: vi.fn() };

    const error = failure(
      validator.validate({ disease: "flu'; DROP TABLE users; --", symptoms: ["fever"] }, SCREENING, security)
    );

    expect(error.kind).toBe("SecurityViolation");
    expect(error.message).toBe("Potential SQL injection detected in disease");
    expect(security.logSecurityEvent).toHaveBeenCalledWith(
      "sql-injection",
      "Potential SQL injection detected in disease",
      { stage: "validation", field: "disease", signature: "drop-table" }
    );
  });

  it("scans strings nested in lists and objects", () => {
    const error = failure(
      validator.validate({ disease: "flu", symptoms: ["fever", { note: "javascript:alert(1)" }] }, SCREENING)
    );

    expect(error.kind).toBe("SecurityViolation");
    expect(error.record.field).toBe("symptoms");
  });

  it("checks security after required fields", () => {
    const error = failure(validator.validate({ disease: "<script>x</script>" }, SCREENING));

    expect(error.kind).toBe("ValidationError");
    expect(error.message).toBe("Missing required field: symptoms");
  });

  it("skips disabled checks", () => {
    const permissive = new InputValidator({ xss: false, sql: false });

    const value = success(
      permissive.validate({ disease: "<script>alert(1)</script>", symptoms: ["DROP TABLE x"] }, SCREENING)
    );

    expect(value).toEqual({ disease: "scriptalert(1)/script", symptoms: ["DROP TABLE x"] });
  });
});

describe("detectThreat", () => {
  it.each([
    ["<img src=x onerror=alert(1)>", "event-handler"],
    ["<IFRAME src='evil'>", "iframe-tag"],
    ["JavaScript : void(0)", "javascript-uri"],
  ])("flags %s as xss", (input, signature) => {
    expect(detectThreat(input)).toEqual({ category: "xss", signature });
  });

  it.each([
    ["1 UNION ALL SELECT password", "union-select"],
    ["insert into users values (1)", "insert-into"],
    ["x; DELETE FROM results", "delete-from"],
  ])("flags %s as sql-injection", (input, signature) => {
    expect(detectThreat(input)).toEqual({ category: "sql-injection", signature });
  });

  it.each(["condition = stable", "select a symptom from the list", "persistent cough"])(
    "lets ordinary text through: %s",
    (input) => {
      expect(detectThreat(input)).toBeNull();
    }
  );
});

// ============================================
// Sanitization
// ============================================

describe("sanitization", () => {
  it("removes markup characters and trims", () => {
    expect(sanitizeString('  Flu "A" type  ')).toBe("Flu A type");
    expect(sanitizeString("Crohn's disease")).toBe("Crohns disease");
  });

  it("truncates to the maximum length", () => {
    expect(sanitizeString("abcdefgh", 5)).toBe("abcde");
    expect(sanitizeString("a".repeat(1500))).toHaveLength(1000);
  });

  it.each([
    '  <b>"quoted"</b>  ',
    "a ".repeat(600),
    "' leading quote",
    "<<>>",
    "",
    "plain text",
  ])("is idempotent for %j", (input) => {
    const once = sanitizeString(input);
    expect(sanitizeString(once)).toBe(once);
  });

  it("sanitizes nested values and leaves other scalars alone", () => {
    const input = { a: ["<x>", 3], b: { c: " 'y' " }, d: true, e: null };

    expect(sanitizeValue(input)).toEqual({ a: ["x", 3], b: { c: "y" }, d: true, e: null });
    expect(input.a[0]).toBe("<x>");
  });

  it("applies the configured length to payload strings", () => {
    const validator = new InputValidator({ maxStringLength: 5 });

    const value = success(validator.validate({ a: "abcdefgh" }, { required: ["a"] }));

    expect(value.a).toBe("abcde");
  });

  it("exposes string sanitization on the validator", () => {
    expect(new InputValidator().sanitize(" <b>bold</b> ")).toBe("bbold/b");
  });

  it("collects nested strings depth first", () => {
    expect(collectStrings({ a: "1", b: ["2", { c: "3" }], d: 4 })).toEqual(["1", "2", "3"]);
  });
});
