
import React, { useMemo, useState } from 'react';
import Header from './components/Header';
import GrantResultsTable from './components/GrantResultsTable';
import { loadGrantFinderConfig } from './services/configService';
import { describeError } from './services/errors';
import { createGrantFinder, GrantFinder } from './services/grantPipeline';
import { MISSION_STATEMENT } from './services/mission';
import { downloadReportDocx } from './services/reportService';
import { GrantFinderConfig, GrantSearchResult, PipelineProgress } from './types';

type Setup = { config: GrantFinderConfig; finder: GrantFinder; error: null } | { config: null; finder: null; error: string };

const initialise = (): Setup => {
  try {
    const config = loadGrantFinderConfig(import.meta.env);
    return { config, finder: createGrantFinder(config), error: null };
  } catch (err) {
    return { config: null, finder: null, error: describeError(err) };
  }
};

const App: React.FC = () => {
  const setup = useMemo(initialise, []);
  const [loading, setLoading] = useState(false);
  const [progress, setProgress] = useState<PipelineProgress | null>(null);
  const [error, setError] = useState<string | null>(setup.error);
  const [result, setResult] = useState<GrantSearchResult | null>(null);

  const handleFindGrants = async () => {
    if (!setup.finder || loading) return;

    setLoading(true);
    setError(null);
    try {
      const next = await setup.finder.run(setProgress);
      setResult(next);
    } catch (err) {
      setError(`Grant search stopped: ${describeError(err)}`);
      console.error(err);
    } finally {
      setLoading(false);
    }
  };

  const handleDownloadReport = () => {
    if (!result) return;
    downloadReportDocx(result, 'Grant_Matches').catch(err => {
      setError(`Report download failed: ${describeError(err)}`);
      console.error(err);
    });
  };

  return (
    <div className="min-h-screen flex flex-col">
      <Header />

      <main className="flex-grow max-w-7xl mx-auto px-6 py-8 w-full space-y-8">
        <div className="text-center space-y-3">
          <h1 className="text-4xl font-black text-slate-900 tracking-tight">
            Smart <span className="text-emerald-600">Grant Finder</span>.
          </h1>
          <blockquote className="mx-auto max-w-3xl text-sm italic text-slate-500">
            <span className="font-bold not-italic text-slate-700">Mission:</span> {MISSION_STATEMENT}
          </blockquote>
        </div>

        <div className="flex flex-col items-center gap-3">
          <button
            type="button"
            onClick={handleFindGrants}
            disabled={loading || !setup.finder}
            className={`px-12 py-5 rounded-3xl font-black text-lg shadow-2xl transition-all ${
              loading || !setup.finder ? 'bg-slate-200 text-slate-400 cursor-not-allowed' : 'bg-slate-900 text-white hover:bg-black active:scale-95'
            }`}
          >
            {loading ? 'Finding & Ranking Grants...' : `Find ${setup.config?.top ?? ''} Best-Fit Grants`}
          </button>
          {loading && progress && (
            <div className="w-full max-w-md space-y-1 text-center">
              <div className="h-1.5 w-full overflow-hidden rounded-full bg-slate-100">
                <div className="h-full bg-emerald-500 transition-all" style={{ width: `${progress.pct}%` }} />
              </div>
              <p className="text-[10px] font-black uppercase tracking-widest text-slate-400">{progress.message}</p>
            </div>
          )}
        </div>

        {error && <div className="p-4 bg-rose-50 border border-rose-100 text-rose-600 rounded-2xl text-xs text-center font-bold">{error}</div>}

        {result ? (
          <GrantResultsTable
            result={result}
            onDownloadReport={result.status === 'ready' ? handleDownloadReport : undefined}
          />
        ) : (
          <p className="text-center text-xs text-slate-400">Click the button to generate, rank and assess grant opportunities.</p>
        )}
      </main>

      <footer className="py-8 text-center text-[10px] font-bold text-slate-300 uppercase tracking-[0.3em]">
        Gemini-generated listings • verify every deadline with the sponsor
      </footer>
    </div>
  );
};

export default App;
