'use client';

import { useRef, useState } from 'react';
import Link from 'next/link';
import {
  Globe, Loader2, ArrowRight, AlertTriangle, RotateCcw, LayoutGrid, MousePointerClick,
  BookOpen, FormInput, Accessibility, Gauge,
} from 'lucide-react';
import { AnalysisResult, CATEGORY_LABELS, CATEGORY_MAX_SCORES, CATEGORY_ORDER, Category, DeviceType } from '@/lib/types';
import { requestAnalysis } from '@/lib/http/analysis-client';
import {
  AnalysisResultsView,
  DEVICE_OPTIONS,
  getErrorGuidance,
  PHASES,
  UiPhase,
} from '@/components/analysis-results';

const CATEGORY_ICONS: Record<Category, typeof Globe> = {
  information_architecture: LayoutGrid,
  cta_visibility: MousePointerClick,
  readability: BookOpen,
  form_ux: FormInput,
  accessibility: Accessibility,
  performance: Gauge,
};

export default function Home() {
  const [url, setUrl] = useState('');
  const [deviceType, setDeviceType] = useState<DeviceType>('desktop');
  const [phase, setPhase] = useState<UiPhase>('idle');
  const [phaseDetail, setPhaseDetail] = useState('');
  const [result, setResult] = useState<AnalysisResult | null>(null);
  const [error, setError] = useState('');
  const resultsRef = useRef<HTMLDivElement>(null);

  const handleAnalyze = async () => {
    if (!url.trim()) return;

    setPhase('capturing');
    setPhaseDetail('');
    setError('');
    setResult(null);

    try {
      const data = await requestAnalysis(url, deviceType, (p, d) => {
        setPhase(p);
        setPhaseDetail(d);
      });
      setPhase('done');
      setPhaseDetail('');
      setResult(data);

      setTimeout(() => {
        resultsRef.current?.scrollIntoView({ behavior: 'smooth', block: 'start' });
      }, 300);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Analysis failed');
      setPhase('error');
    }
  };

  const isLoading = phase !== 'idle' && phase !== 'done' && phase !== 'error';

  return (
    <div className="min-h-screen flex flex-col">
      <nav
        className="sticky top-0 z-50 backdrop-blur-xl border-b border-border"
        style={{ backgroundColor: 'var(--nav-bg)' }}
      >
        <div className="max-w-6xl mx-auto px-6 flex items-center justify-between h-16">
          <Link href="/" className="flex items-center gap-3">
            <div className="w-8 h-8 rounded-lg bg-gradient-to-br from-accent to-accent-light flex items-center justify-center">
              <Gauge size={16} className="text-white" />
            </div>
            <span className="text-base font-bold tracking-tight">PageGrade</span>
          </Link>
        </div>
      </nav>

      <header className="relative overflow-hidden">
        <div className="absolute inset-0 dot-grid opacity-50" />

        <div className="relative max-w-5xl mx-auto px-6 pt-20 pb-16">
          <div className="text-center max-w-3xl mx-auto">
            <h1 className="text-4xl sm:text-[56px] font-bold tracking-[-0.03em] leading-[1.1] mb-6">
              How usable is your page?
            </h1>

            <p className="text-[17px] text-text-secondary leading-relaxed mb-12 max-w-xl mx-auto">
              26 usability rules across six categories, scored out of 100 with a ranked list of fixes.
            </p>

            <div className="max-w-xl mx-auto">
              <div className="relative flex items-center">
                <div className="absolute left-4 text-text-muted">
                  <Globe size={20} />
                </div>
                <input
                  type="url"
                  value={url}
                  onChange={(e) => setUrl(e.target.value)}
                  onKeyDown={(e) => e.key === 'Enter' && !isLoading && handleAnalyze()}
                  placeholder="example.com"
                  className="w-full h-14 pl-12 pr-36 rounded-xl bg-bg-card border border-border focus:border-accent/50 focus:ring-1 focus:ring-accent/20 outline-none text-text placeholder-text-muted transition-all text-base"
                  disabled={isLoading}
                />
                <div className="absolute right-1.5">
                  <button
                    onClick={handleAnalyze}
                    disabled={!url.trim() || isLoading}
                    className="h-11 px-6 rounded-[10px] bg-accent hover:bg-accent-light disabled:opacity-40 disabled:cursor-not-allowed text-white font-semibold text-[15px] transition-all flex items-center gap-2 cursor-pointer"
                  >
                    {isLoading ? (
                      <Loader2 size={16} className="animate-spin" />
                    ) : (
                      <>
                        <span>Analyze</span>
                        <ArrowRight size={15} />
                      </>
                    )}
                  </button>
                </div>
              </div>

              <div className="flex items-center justify-center mt-4 gap-2">
                {DEVICE_OPTIONS.map(option => (
                  <button
                    key={option.id}
                    onClick={() => setDeviceType(option.id)}
                    disabled={isLoading}
                    className={`px-3.5 py-1.5 rounded-lg text-xs font-medium transition-all cursor-pointer flex items-center gap-1.5 ${
                      deviceType === option.id ? 'bg-accent text-white' : 'bg-bg-card text-text-secondary hover:text-text'
                    }`}
                  >
                    <option.icon size={13} />
                    {option.label}
                  </button>
                ))}
              </div>

              {isLoading && (
                <div className="mt-8 flex items-center justify-center gap-0" style={{ animation: 'fadeIn 0.3s ease-out' }}>
                  {PHASES.map((p, i) => {
                    const phaseIndex = PHASES.findIndex(ph => ph.id === phase);
                    const isActive = i === phaseIndex;
                    const isDone = i < phaseIndex;

                    return (
                      <div key={p.id} className="flex items-center">
                        <div className="flex flex-col items-center gap-1.5">
                          <div
                            className={`w-9 h-9 rounded-lg flex items-center justify-center text-xs font-bold transition-all ${
                              isActive
                                ? 'bg-accent text-white'
                                : isDone
                                ? 'bg-score-pass/20 text-score-pass'
                                : 'bg-bg-card text-text-muted'
                            }`}
                            style={isActive ? { animation: 'stepperPulse 2s ease-in-out infinite' } : {}}
                          >
                            {isDone ? '✓' : i + 1}
                          </div>
                          <div className="text-center">
                            <div className={`text-xs font-medium ${isActive ? 'text-text' : isDone ? 'text-score-pass' : 'text-text-muted'}`}>
                              {p.label}
                            </div>
                            {isActive && (
                              <div className="text-[11px] text-text-secondary" style={{ animation: 'fadeIn 0.3s ease-out' }}>
                                {phaseDetail || p.desc}
                              </div>
                            )}
                          </div>
                        </div>
                        {i < PHASES.length - 1 && (
                          <div className={`w-12 h-px mx-2 mt-[-20px] ${isDone ? 'bg-score-pass/30' : 'bg-border'}`} />
                        )}
                      </div>
                    );
                  })}
                </div>
              )}

              {error && (() => {
                const guidance = getErrorGuidance(error);
                return (
                  <div className="mt-5 p-5 rounded-xl bg-bg-card border border-border border-l-4 border-l-danger text-left" style={{ animation: 'fadeInUp 0.3s ease-out' }}>
                    <div className="flex items-start gap-3">
                      <AlertTriangle size={18} className="text-danger shrink-0 mt-0.5" />
                      <div className="flex-1">
                        <h4 className="font-semibold text-text text-[15px]">{guidance.title}</h4>
                        <p className="text-sm text-text-secondary mt-1.5 leading-relaxed">{guidance.suggestion}</p>
                        <div className="flex items-center gap-3 mt-4">
                          <button
                            onClick={handleAnalyze}
                            className="px-4 py-2 rounded-lg bg-accent hover:bg-accent-light text-white text-sm font-medium transition-all cursor-pointer flex items-center gap-1.5"
                          >
                            <RotateCcw size={13} />
                            Try Again
                          </button>
                          <button
                            onClick={() => { setError(''); setPhase('idle'); }}
                            className="px-4 py-2 rounded-lg bg-bg-elevated text-text-secondary hover:text-text text-sm font-medium transition-all cursor-pointer"
                          >
                            Clear
                          </button>
                        </div>
                      </div>
                    </div>
                  </div>
                );
              })()}
            </div>
          </div>
        </div>
      </header>

      {result && (
        <main ref={resultsRef} className="max-w-6xl mx-auto w-full px-6 pb-20">
          <AnalysisResultsView result={result} />
        </main>
      )}

      {!result && !isLoading && phase !== 'error' && (
        <section className="max-w-6xl mx-auto px-6 pb-20">
          <h2 className="text-2xl font-bold text-center mb-10 tracking-tight">What gets scored</h2>
          <div className="grid grid-cols-2 md:grid-cols-3 gap-4">
            {CATEGORY_ORDER.map(category => {
              const Icon = CATEGORY_ICONS[category];
              return (
                <div key={category} className="p-5 rounded-xl bg-bg-card border border-border flex items-center gap-3">
                  <Icon size={18} className="text-accent-light shrink-0" />
                  <span className="text-sm font-medium flex-1">{CATEGORY_LABELS[category]}</span>
                  <span className="text-xs font-mono text-text-muted tabular-nums">{CATEGORY_MAX_SCORES[category]} pts</span>
                </div>
              );
            })}
          </div>
        </section>
      )}
    </div>
  );
}
