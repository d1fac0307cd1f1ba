import React from "react";
import { ArrowLeft, CheckCircle2 } from "lucide-react";
import type { SubmitResponse } from "../services/statusApi";

type Props = {
  result: SubmitResponse | null;
  onBack: () => void;
};

const Confirmation: React.FC<Props> = ({ result, onBack }) => {
  return (
    <div className="flex flex-col gap-6">
      <h2 className="text-3xl font-black tracking-tight heading-font">Status Confirmation</h2>
      <div role="status" className="flex items-center gap-3 px-4 py-3 rounded-xl bg-emerald-500 text-white font-bold">
        <CheckCircle2 className="w-5 h-5" />
        Status saved successfully!
      </div>
      {result && (
        <p className="text-sm text-slate-500">
          {result.created ? "Created" : "Updated"} <span className="font-mono">{result.fileName}</span>
        </p>
      )}
      <div>
        <button
          onClick={onBack}
          className="px-6 py-3 rounded-full flex items-center gap-2 font-black text-xs uppercase tracking-widest shadow-xl transition-all active:scale-95 btn-primary"
        >
          <ArrowLeft className="w-4 h-4" />
          Go Back
        </button>
      </div>
    </div>
  );
};

export default Confirmation;
