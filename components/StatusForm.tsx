import React from "react";
import { AlertCircle, CalendarDays, Loader2, Send, User } from "lucide-react";
import type { FormValues } from "../src/app/state/statusFormMachine";
import { STATUS_TYPES, type StatusType } from "../types";

type Props = {
  values: FormValues;
  profiles: string[];
  today: string;
  submitting: boolean;
  error: string | null;
  onStatusType: (type: StatusType) => void;
  onProfile: (profile: string) => void;
  onDate: (date: string) => void;
  onStartDate: (date: string) => void;
  onEndDate: (date: string) => void;
  onContent: (content: string) => void;
  onSubmit: () => void;
};

const fieldClass =
  "w-full px-4 py-3 rounded-xl border border-slate-300 bg-white text-slate-900 focus:outline-none focus:ring-2 focus:ring-indigo-500";
const labelClass = "flex items-center gap-2 text-xs font-black uppercase tracking-widest text-slate-500";

function isStatusType(value: string): value is StatusType {
  return STATUS_TYPES.some((t) => t === value);
}

const StatusForm: React.FC<Props> = ({
  values,
  profiles,
  today,
  submitting,
  error,
  onStatusType,
  onProfile,
  onDate,
  onStartDate,
  onEndDate,
  onContent,
  onSubmit,
}) => {
  const handleSubmit = (e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    onSubmit();
  };

  return (
    <form className="flex flex-col gap-6" onSubmit={handleSubmit} noValidate>
      <div className="flex flex-col gap-2">
        <label htmlFor="status-type" className={labelClass}>
          <CalendarDays className="w-4 h-4" /> Status Type
        </label>
        <select
          id="status-type"
          className={fieldClass}
          value={values.statusType}
          onChange={(e) => {
            if (isStatusType(e.target.value)) onStatusType(e.target.value);
          }}
        >
          {STATUS_TYPES.map((t) => (
            <option key={t} value={t}>
              {t}
            </option>
          ))}
        </select>
      </div>

      <div className="flex flex-col gap-2">
        <label htmlFor="profile" className={labelClass}>
          <User className="w-4 h-4" /> Profile / Project
        </label>
        <select id="profile" className={fieldClass} value={values.profile} onChange={(e) => onProfile(e.target.value)}>
          {profiles.map((p) => (
            <option key={p} value={p}>
              {p}
            </option>
          ))}
        </select>
      </div>

      {values.statusType === "Daily" ? (
        <div className="flex flex-col gap-2">
          <label htmlFor="date" className={labelClass}>
            Select Date
          </label>
          <input
            id="date"
            type="date"
            className={fieldClass}
            value={values.date}
            max={today}
            onChange={(e) => onDate(e.target.value)}
          />
        </div>
      ) : (
        <div className="grid grid-cols-2 gap-4">
          <div className="flex flex-col gap-2">
            <label htmlFor="start-date" className={labelClass}>
              Start Date
            </label>
            <input
              id="start-date"
              type="date"
              className={fieldClass}
              value={values.startDate}
              max={today}
              onChange={(e) => onStartDate(e.target.value)}
            />
          </div>
          <div className="flex flex-col gap-2">
            <label htmlFor="end-date" className={labelClass}>
              End Date
            </label>
            <input
              id="end-date"
              type="date"
              className={fieldClass}
              value={values.endDate}
              min={values.startDate}
              max={today}
              onChange={(e) => onEndDate(e.target.value)}
            />
          </div>
        </div>
      )}

      <div className="flex flex-col gap-2">
        <label htmlFor="status-text" className={labelClass}>
          Write Your Status
        </label>
        <textarea
          id="status-text"
          className={`${fieldClass} min-h-[180px]`}
          placeholder="Write your status here"
          value={values.content}
          onChange={(e) => onContent(e.target.value)}
        />
      </div>

      {error && (
        <div role="alert" className="flex items-center gap-3 px-4 py-3 rounded-xl bg-red-500 text-white text-sm font-bold">
          <AlertCircle className="w-4 h-4 flex-shrink-0" />
          {error}
        </div>
      )}

      <div className="flex justify-end">
        <button
          type="submit"
          disabled={submitting}
          className="px-6 py-3 rounded-full flex items-center gap-2 font-black text-xs uppercase tracking-widest shadow-xl transition-all active:scale-95 btn-primary disabled:opacity-50"
        >
          {submitting ? <Loader2 className="w-4 h-4 animate-spin" /> : <Send className="w-4 h-4" />}
          Submit
        </button>
      </div>
    </form>
  );
};

export default StatusForm;
