import { STATUS_TYPES, type StatusEntry, type StatusPeriod, type StatusType } from "../types";
import { ValidationError } from "../utils/errors";
import { buildFileName, compareIsoDates, isIsoDate } from "../utils/statusPeriod";

export const EMPTY_STATUS_MESSAGE = "Status cannot be empty!";

export type ValidationOptions = {
  profiles: string[];
  /** `YYYY-MM-DD`; dates after it are rejected. */
  today: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStatusType(value: unknown): value is StatusType {
  return typeof value === "string" && STATUS_TYPES.some((t) => t === value);
}

function readDate(body: Record<string, unknown>, field: string, today: string): string {
  const value = body[field];
  if (typeof value !== "string" || !isIsoDate(value)) {
    throw new ValidationError(`"${field}" must be a date in YYYY-MM-DD format`, { field });
  }
  if (compareIsoDates(value, today) > 0) {
    throw new ValidationError(`"${field}" cannot be in the future`, { field, today });
  }
  return value;
}

export function validatePeriod(
  type: StatusType,
  body: Record<string, unknown>,
  today: string
): StatusPeriod {
  if (type === "Daily") {
    return { type, date: readDate(body, "date", today) };
  }
  const startDate = readDate(body, "startDate", today);
  const endDate = readDate(body, "endDate", today);
  if (compareIsoDates(startDate, endDate) > 0) {
    throw new ValidationError("Start date must be on or before end date", { startDate, endDate });
  }
  return { type, startDate, endDate };
}

export function isBlank(content: string): boolean {
  return content.trim().length === 0;
}

/**
 * Turns an untrusted request body into a StatusEntry, or throws ValidationError.
 * Content is trimmed the same way the form trims it.
 */
export function validateStatusRequest(input: unknown, options: ValidationOptions): StatusEntry {
  if (!isRecord(input)) {
    throw new ValidationError("Request body must be a JSON object");
  }

  if (!isStatusType(input.type)) {
    throw new ValidationError(`"type" must be one of ${STATUS_TYPES.join(", ")}`);
  }

  const content = typeof input.content === "string" ? input.content : "";
  if (isBlank(content)) {
    throw new ValidationError(EMPTY_STATUS_MESSAGE);
  }

  const profile = input.profile;
  if (typeof profile !== "string" || !options.profiles.includes(profile)) {
    throw new ValidationError(`Unknown profile "${String(profile)}"`, { profile: String(profile) });
  }

  const period = validatePeriod(input.type, input, options.today);

  return {
    profile,
    period,
    content: content.trim(),
    fileName: buildFileName(period),
  };
}
