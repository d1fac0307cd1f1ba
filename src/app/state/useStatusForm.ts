import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type { StatusApi } from "../../../services/statusApi";
import type { StatusType } from "../../../types";
import { toUserMessage } from "../../../utils/errors";
import { getLogger } from "../../../utils/logger";
import { toIsoDate } from "../../../utils/statusPeriod";
import {
  buildStatusRequest,
  initialFormState,
  initialValues,
  transitionFormState,
  withStartDate,
  type FormEvent,
  type FormState,
  type FormValues,
} from "./statusFormMachine";

const formLog = getLogger("Form");

export function useStatusForm(api: StatusApi) {
  const [state, setState] = useState<FormState>(initialFormState);
  const [values, setValues] = useState<FormValues>(() => initialValues(toIsoDate(new Date())));
  const [profiles, setProfiles] = useState<string[]>([]);
  const [today, setToday] = useState<string>(() => toIsoDate(new Date()));
  const [configError, setConfigError] = useState<string | null>(null);

  // Mirrors `state` so a double click cannot start two submissions before re-render.
  const stateRef = useRef<FormState>(initialFormState);

  const dispatch = useCallback((event: FormEvent): FormState => {
    const next = transitionFormState(stateRef.current, event);
    stateRef.current = next;
    setState(next);
    return next;
  }, []);

  useEffect(() => {
    let cancelled = false;
    api
      .fetchConfig()
      .then((config) => {
        if (cancelled) return;
        setProfiles(config.profiles);
        setToday(config.today);
        setValues((v) => ({
          ...initialValues(config.today, config.profiles[0] ?? ""),
          content: v.content,
        }));
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        formLog.error("config.failed", { message: toUserMessage(err) });
        setConfigError(`Could not load profiles: ${toUserMessage(err)}`);
      });
    return () => {
      cancelled = true;
    };
  }, [api]);

  const submit = useCallback(async () => {
    const next = dispatch({ type: "submit", content: values.content });
    if (next.view !== "Submitting") return;

    try {
      const result = await api.submit(buildStatusRequest(values));
      formLog.info("submit.ok", { fileName: result.fileName, created: result.created });
      dispatch({ type: "succeeded", result });
    } catch (err) {
      formLog.error("submit.failed", { message: toUserMessage(err) });
      dispatch({ type: "failed", error: err });
    }
  }, [api, dispatch, values]);

  const goBack = useCallback(() => {
    if (stateRef.current.view !== "Confirmation") return;
    dispatch({ type: "goBack" });
    setValues((v) => ({ ...v, content: "" }));
  }, [dispatch]);

  const setters = useMemo(
    () => ({
      setStatusType: (statusType: StatusType) => setValues((v) => ({ ...v, statusType })),
      setProfile: (profile: string) => setValues((v) => ({ ...v, profile })),
      setDate: (date: string) => setValues((v) => ({ ...v, date })),
      setStartDate: (startDate: string) => setValues((v) => withStartDate(v, startDate)),
      setEndDate: (endDate: string) => setValues((v) => ({ ...v, endDate })),
      setContent: (content: string) => setValues((v) => ({ ...v, content })),
    }),
    []
  );

  return { state, values, profiles, today, configError, submit, goBack, ...setters };
}
