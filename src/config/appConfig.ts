type Env = Record<string, string | boolean | undefined>;

function getEnv(): Env {
  return import.meta.env ?? {};
}

function toOptionalString(value: string | boolean | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const env = getEnv();

const API_BASE = toOptionalString(env.VITE_STATUS_API_BASE) ?? "";
const PROFILE_LIST_URL = toOptionalString(env.VITE_PROFILE_LIST_URL);
const APP_TITLE = toOptionalString(env.VITE_APP_TITLE) ?? "Status Ledger";

/** Browser-side settings, baked in by Vite at build time. */
export const appConfig = {
  api: {
    base: API_BASE.replace(/\/+$/, ""),
  },
  ui: {
    title: APP_TITLE,
    profileListUrl: PROFILE_LIST_URL,
  },
};
