/**
 * Editorial contract loader.
 *
 * Validates a raw contract (object or JSON string) against the schema,
 * applies defaults, checks cross-field constraints zod can't express and
 * deep-freezes the result.
 */

import { readFileSync } from "node:fs";
import {
  EditorialContractSchema,
  type EditorialContract,
  type MetaLimit,
  type Range,
} from "./editorial-schema.js";

/**
 * Validation error for contract loading.
 */
export class StandardsValidationError extends Error {
  public readonly issues: StandardsIssue[];

  constructor(message: string, issues: StandardsIssue[]) {
    super(message);
    this.name = "StandardsValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Editorial contract validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface StandardsIssue {
  path: string;
  message: string;
  code: string;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function checkRange(path: string, range: Range, issues: StandardsIssue[]): void {
  if (range.min > range.max) {
    issues.push({ path, message: "min must be <= max", code: "invalid_range" });
  }
}

function checkMetaLimit(path: string, limit: MetaLimit, issues: StandardsIssue[]): void {
  checkRange(path, limit, issues);
  if (limit.truncateAt + 3 > limit.max) {
    issues.push({
      path: `${path}.truncateAt`,
      message: `truncateAt + 3 must be <= max (${limit.max}) so fixed values pass`,
      code: "invalid_constraint",
    });
  }
}

/**
 * Validate constraints that span fields.
 */
function validateContractConstraints(contract: EditorialContract): StandardsIssue[] {
  const issues: StandardsIssue[] = [];

  checkMetaLimit("metaTitle", contract.metaTitle, issues);
  checkMetaLimit("metaDescription", contract.metaDescription, issues);
  checkRange("wordCount", contract.wordCount, issues);
  checkRange("introWords", contract.introWords, issues);
  checkRange("sections", contract.sections, issues);
  checkRange("listSections", contract.listSections, issues);
  checkRange("sources", contract.sources, issues);

  if (contract.sources.minTitleLength > contract.sources.maxTitleLength) {
    issues.push({
      path: "sources.minTitleLength",
      message: "minTitleLength must be <= maxTitleLength",
      code: "invalid_range",
    });
  }

  return issues;
}

/**
 * Load and validate an editorial contract.
 *
 * @param input - Raw contract object or JSON string; `{}` yields the defaults
 * @throws StandardsValidationError if validation fails
 */
export function loadEditorialContract(input: unknown = {}): Readonly<EditorialContract> {
  let data: unknown = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (err) {
      throw new StandardsValidationError("Editorial contract is not valid JSON", [
        {
          path: "(root)",
          message: err instanceof Error ? err.message : String(err),
          code: "invalid_json",
        },
      ]);
    }
  }

  const result = EditorialContractSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join(".") || "(root)",
      message: i.message,
      code: i.code,
    }));
    throw new StandardsValidationError(
      `Editorial contract validation failed: ${issues.length} error(s)`,
      issues
    );
  }

  const constraintIssues = validateContractConstraints(result.data);
  if (constraintIssues.length > 0) {
    throw new StandardsValidationError(
      "Editorial contract constraint validation failed",
      constraintIssues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load an editorial contract from a JSON file.
 */
export function loadEditorialContractFromFile(filePath: string): Readonly<EditorialContract> {
  return loadEditorialContract(readFileSync(filePath, "utf-8"));
}

/** The standard contract. */
export const DEFAULT_EDITORIAL_CONTRACT: Readonly<EditorialContract> = loadEditorialContract({});
