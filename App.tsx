import React, { useMemo } from 'react';
import { ClipboardList, ExternalLink } from 'lucide-react';
import StatusForm from './components/StatusForm';
import Confirmation from './components/Confirmation';
import { createStatusApi, type StatusApi } from './services/statusApi';
import { useStatusForm } from './src/app/state/useStatusForm';
import { appConfig } from './src/config/appConfig';

type Props = {
  api?: StatusApi;
};

const App: React.FC<Props> = ({ api }) => {
  const statusApi = useMemo(() => api ?? createStatusApi(), [api]);
  const form = useStatusForm(statusApi);
  const { state } = form;

  return (
    <div className="min-h-screen bg-slate-50 text-slate-900">
      <main className="max-w-2xl mx-auto px-6 sm:px-10 py-10 sm:py-12 flex flex-col gap-8">
        {state.view === 'Confirmation' ? (
          <Confirmation result={state.lastResult} onBack={form.goBack} />
        ) : (
          <>
            <header className="flex flex-col gap-3">
              <div className="flex items-center gap-3">
                <ClipboardList className="w-7 h-7 text-indigo-600" />
                <h1 className="text-3xl font-black tracking-tight heading-font">{appConfig.ui.title}</h1>
              </div>
              {appConfig.ui.profileListUrl && (
                <a
                  href={appConfig.ui.profileListUrl}
                  target="_blank"
                  rel="noreferrer"
                  className="flex items-center gap-1 text-sm text-indigo-600 underline"
                >
                  View Profile List <ExternalLink className="w-3 h-3" />
                </a>
              )}
            </header>

            {form.configError && (
              <div role="alert" className="px-4 py-3 rounded-xl bg-amber-500 text-white text-sm font-bold">
                {form.configError}
              </div>
            )}

            <StatusForm
              values={form.values}
              profiles={form.profiles}
              today={form.today}
              submitting={state.view === 'Submitting'}
              error={state.error}
              onStatusType={form.setStatusType}
              onProfile={form.setProfile}
              onDate={form.setDate}
              onStartDate={form.setStartDate}
              onEndDate={form.setEndDate}
              onContent={form.setContent}
              onSubmit={() => void form.submit()}
            />
          </>
        )}
      </main>
    </div>
  );
};

export default App;
