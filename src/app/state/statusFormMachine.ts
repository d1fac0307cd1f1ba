import { EMPTY_STATUS_MESSAGE, isBlank } from "../../../services/statusValidation";
import type { SubmitResponse } from "../../../services/statusApi";
import type { StatusRequest, StatusType } from "../../../types";
import { toUserMessage } from "../../../utils/errors";
import { compareIsoDates } from "../../../utils/statusPeriod";

export type FormView = "Input" | "Submitting" | "Confirmation";

export type FormState = {
  view: FormView;
  error: string | null;
  lastResult: SubmitResponse | null;
};

export type FormEvent =
  | { type: "submit"; content: string }
  | { type: "succeeded"; result: SubmitResponse }
  | { type: "failed"; error: unknown }
  | { type: "goBack" };

export type FormValues = {
  statusType: StatusType;
  profile: string;
  date: string;
  startDate: string;
  endDate: string;
  content: string;
};

export const ERROR_PREFIX = "An error occurred: ";

export const initialFormState: FormState = { view: "Input", error: null, lastResult: null };

export function transitionFormState(state: FormState, event: FormEvent): FormState {
  switch (event.type) {
    case "submit":
      if (state.view !== "Input") return state;
      if (isBlank(event.content)) return { ...state, error: EMPTY_STATUS_MESSAGE };
      return { view: "Submitting", error: null, lastResult: null };
    case "succeeded":
      if (state.view !== "Submitting") return state;
      return { view: "Confirmation", error: null, lastResult: event.result };
    case "failed":
      if (state.view !== "Submitting") return state;
      return { view: "Input", error: `${ERROR_PREFIX}${toUserMessage(event.error)}`, lastResult: null };
    case "goBack":
      if (state.view !== "Confirmation") return state;
      return initialFormState;
  }
}

export function initialValues(today: string, profile = ""): FormValues {
  return { statusType: "Daily", profile, date: today, startDate: today, endDate: today, content: "" };
}

/** Start date changes drag the end date along so start ≤ end always holds. */
export function withStartDate(values: FormValues, startDate: string): FormValues {
  const endDate = compareIsoDates(values.endDate, startDate) < 0 ? startDate : values.endDate;
  return { ...values, startDate, endDate };
}

export function buildStatusRequest(values: FormValues): StatusRequest {
  const base = { type: values.statusType, profile: values.profile, content: values.content.trim() };
  if (values.statusType === "Daily") return { ...base, date: values.date };
  return { ...base, startDate: values.startDate, endDate: values.endDate };
}
