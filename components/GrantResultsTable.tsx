import React, { useMemo } from 'react';
import { Feasibility, GrantSearchResult } from '../types';
import { ResultRow, toResultRows } from '../services/resultTableService';

interface Props {
  result: GrantSearchResult;
  onDownloadReport?: () => void;
  today?: Date;
}

const COLUMN_LABELS = ['#', 'Title', 'Sponsor', 'Amount', 'Similarity', 'Feasibility', 'Why it fits', 'Deadline', 'URL'];

export const EMPTY_MESSAGES = {
  no_grants: 'Gemini returned no grants. Click again or try later.',
  parse_error: 'Gemini answered, but no grant list could be read from the response. Click again to retry.',
} as const;

const FEASIBILITY_TONES: Record<Feasibility, string> = {
  High: 'border-emerald-200 bg-emerald-50 text-emerald-700',
  Medium: 'border-amber-200 bg-amber-50 text-amber-700',
  Low: 'border-rose-200 bg-rose-50 text-rose-700',
  Unknown: 'border-slate-200 bg-slate-50 text-slate-500',
};

const renderDeadline = (row: ResultRow): React.ReactNode => {
  if (!row.deadline) return <span className="text-slate-400">N/A</span>;
  return (
    <span className={row.deadlineStatus === 'passed' ? 'text-rose-600' : undefined}>
      {row.deadline}
      {row.deadlineStatus === 'passed' && (
        <span className="ml-1 text-[10px] font-black uppercase tracking-widest">Passed</span>
      )}
    </span>
  );
};

const GrantResultsTable: React.FC<Props> = ({ result, onDownloadReport, today }) => {
  const rows = useMemo(
    () => (result.status === 'ready' ? toResultRows(result.grants, today) : []),
    [result, today]
  );

  if (result.status === 'empty') {
    return (
      <div role="status" className="rounded-2xl border border-amber-200 bg-amber-50 p-4 text-xs font-semibold text-amber-700">
        {EMPTY_MESSAGES[result.reason]}
      </div>
    );
  }

  return (
    <div className="space-y-4">
      <div className="overflow-x-auto rounded-3xl glass-panel shadow-sm">
        <table className="min-w-full text-left text-xs text-slate-700">
          <thead className="bg-slate-50 text-[10px] font-black uppercase tracking-widest text-slate-400">
            <tr>
              {COLUMN_LABELS.map(label => (
                <th key={label} scope="col" className="px-4 py-3">
                  {label}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map(row => (
              <tr key={`${row.rank}-${row.title}`} className="border-t border-slate-100 align-top">
                <td className="px-4 py-3 font-black text-slate-400">{row.rank}</td>
                <td className="px-4 py-3 font-semibold text-slate-800">{row.title || 'Untitled opportunity'}</td>
                <td className="px-4 py-3">{row.sponsor || 'N/A'}</td>
                <td className="px-4 py-3 whitespace-nowrap">{row.amount || 'N/A'}</td>
                <td className="px-4 py-3" title={`${row.matchPercent.toFixed(1)}% match`}>
                  {row.similarity.toFixed(3)}
                </td>
                <td className="px-4 py-3">
                  <span className={`rounded-full border px-3 py-1 text-[11px] font-semibold ${FEASIBILITY_TONES[row.feasibility]}`}>
                    {row.feasibility}
                  </span>
                </td>
                <td className="px-4 py-3 text-[11px] text-slate-600">{row.why_fit || '-'}</td>
                <td className="px-4 py-3">{renderDeadline(row)}</td>
                <td className="px-4 py-3">
                  {row.url ? (
                    <a href={row.url} target="_blank" rel="noreferrer" className="text-emerald-700 underline">
                      Open
                    </a>
                  ) : (
                    <span className="text-slate-400">N/A</span>
                  )}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div className="flex items-start justify-between gap-4">
        <details className="flex-1 rounded-2xl border border-slate-100 bg-white p-4">
          <summary className="cursor-pointer text-[10px] font-black uppercase tracking-widest text-slate-400">
            Technical Details
          </summary>
          <div className="mt-3 space-y-2 rounded-xl border border-slate-100 bg-slate-50 p-3 text-[11px] text-slate-600">
            <p><span className="font-semibold text-slate-700">Run:</span> #{result.trace.runId}</p>
            <p><span className="font-semibold text-slate-700">Completion Model:</span> {result.trace.completionModel}</p>
            <p><span className="font-semibold text-slate-700">Embedding Model:</span> {result.trace.embeddingModel}</p>
            <p><span className="font-semibold text-slate-700">Candidates Ranked:</span> {result.trace.candidateCount}</p>
            <p><span className="font-semibold text-slate-700">Retries:</span> {result.trace.retries}</p>
            <p><span className="font-semibold text-slate-700">Cached Generation:</span> {result.trace.cacheHit ? 'Yes' : 'No'}</p>
            <p><span className="font-semibold text-slate-700">Finished:</span> {result.trace.finishedAt}</p>
          </div>
        </details>

        {onDownloadReport && (
          <button
            type="button"
            onClick={onDownloadReport}
            className="rounded-xl bg-emerald-600 px-6 py-2 text-xs font-black text-white shadow-lg transition-all hover:bg-emerald-700 active:scale-95"
          >
            Download .docx
          </button>
        )}
      </div>
    </div>
  );
};

export default GrantResultsTable;
