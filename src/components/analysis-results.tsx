'use client';

import { useState } from 'react';
import {
  Globe, BarChart3, Zap, ExternalLink, Monitor, Tablet, Smartphone,
  TrendingUp, TrendingDown, Clock,
} from 'lucide-react';
import {
  AnalysisPhase, AnalysisResult, CATEGORY_LABELS, CATEGORY_ORDER, CategoryStanding,
  DeviceType, RuleResultPayload,
} from '@/lib/types';
import { ScoreRing } from '@/components/score-ring';
import { CategoryCard } from '@/components/category-card';
import { RecommendationCard } from '@/components/recommendation-card';

export function getErrorGuidance(error: string): { title: string; suggestion: string } {
  if (error.includes('HTTP 403') || error.includes('HTTP 401'))
    return { title: 'Access Denied', suggestion: 'This site blocks automated requests. Try a different page or check whether it needs a login.' };
  if (error.includes('HTTP 404'))
    return { title: 'Page Not Found', suggestion: 'Double-check the URL. Make sure it points to an existing page.' };
  if (error.includes('timed out'))
    return { title: 'Request Timed Out', suggestion: 'The site took too long to respond. Try again in a few minutes.' };
  if (error.includes('ENOTFOUND') || error.includes('getaddrinfo'))
    return { title: 'Domain Not Found', suggestion: "This domain doesn't exist. Check the URL for typos." };
  if (error.includes('valid URL') || error.includes('HTTP(S)'))
    return { title: 'Invalid URL', suggestion: 'Enter a complete URL like "example.com" or "https://example.com/page".' };
  if (error.includes('private/internal'))
    return { title: 'Address Not Allowed', suggestion: 'Only publicly reachable sites can be analyzed.' };
  return { title: 'Analysis Failed', suggestion: 'Something went wrong. Try again or try a different URL.' };
}

export const PHASES: readonly { id: AnalysisPhase; label: string; desc: string }[] = [
  { id: 'capturing', label: 'Capture', desc: 'Fetching the page' },
  { id: 'extracting-html', label: 'Structure', desc: 'Reading the markup' },
  { id: 'extracting-image', label: 'Visuals', desc: 'Estimating layout signals' },
  { id: 'scoring', label: 'Scoring', desc: 'Applying usability rules' },
];

export type UiPhase = 'idle' | AnalysisPhase | 'done' | 'error';

export const DEVICE_OPTIONS: readonly { id: DeviceType; label: string; icon: typeof Monitor }[] = [
  { id: 'desktop', label: 'Desktop', icon: Monitor },
  { id: 'tablet', label: 'Tablet', icon: Tablet },
  { id: 'mobile', label: 'Mobile', icon: Smartphone },
];

/** First fired rule whose advice matches the ranked text. */
export function findRecommendationSource(
  result: Pick<AnalysisResult, 'category_details'>,
  text: string,
): RuleResultPayload | undefined {
  for (const category of CATEGORY_ORDER) {
    const match = result.category_details[category].rules.find(r => r.recommendation === text);
    if (match) return match;
  }
  return undefined;
}

type Tab = 'overview' | 'categories' | 'recommendations';

export function AnalysisResultsView({ result }: { result: AnalysisResult }) {
  const [activeTab, setActiveTab] = useState<Tab>('overview');
  const device = DEVICE_OPTIONS.find(d => d.id === result.device_type);
  const DeviceIcon = device?.icon ?? Monitor;

  return (
    <div style={{ animation: 'fadeInUp 0.6s ease-out' }}>
      <div className="flex items-center gap-3 px-5 py-3 mb-6 rounded-xl bg-bg-card border border-border min-w-0">
        <Globe size={16} className="text-text-muted shrink-0" />
        <a href={result.url} target="_blank" rel="noopener noreferrer" className="text-sm text-accent-light hover:underline truncate flex items-center gap-1.5">
          {result.page_title || result.url}
          <ExternalLink size={12} />
        </a>
        <span className="flex items-center gap-1 text-[10px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest bg-accent-dim text-accent-light shrink-0">
          <DeviceIcon size={11} />
          {device?.label ?? result.device_type}
        </span>
        <span className="flex items-center gap-1 text-xs text-text-muted shrink-0 font-mono tabular-nums ml-auto">
          <Clock size={12} />
          {result.analysis_time.toFixed(1)}s
        </span>
      </div>

      <div className="grid grid-cols-1 md:grid-cols-[1.2fr_1fr_1fr] gap-5 mb-6">
        <div className="p-9 rounded-xl bg-bg-card border border-border flex flex-col items-center justify-center">
          <ScoreRing score={result.total_score} size={170} label="Usability Score" />
        </div>
        <StandingList
          title="Strengths"
          icon={<TrendingUp size={16} className="text-score-pass" />}
          entries={result.summary.strengths}
          empty="No category reached 70% yet."
        />
        <StandingList
          title="Needs work"
          icon={<TrendingDown size={16} className="text-score-fail" />}
          entries={result.summary.weaknesses}
          empty="No category fell below 50%."
        />
      </div>

      <div className="flex items-center gap-0.5 mb-6 border-b border-border overflow-x-auto">
        {([
          { id: 'overview' as const, label: 'Overview', icon: BarChart3 },
          { id: 'categories' as const, label: 'Rule Details', icon: Globe },
          { id: 'recommendations' as const, label: 'Recommendations', icon: Zap },
        ]).map(tab => (
          <button
            key={tab.id}
            onClick={() => setActiveTab(tab.id)}
            className={`flex items-center gap-2 px-5 py-3.5 text-sm font-medium border-b-2 transition-all whitespace-nowrap cursor-pointer ${
              activeTab === tab.id
                ? 'border-accent text-text'
                : 'border-transparent text-text-muted hover:text-text-secondary'
            }`}
          >
            <tab.icon size={15} />
            {tab.label}
          </button>
        ))}
      </div>

      <div key={activeTab} style={{ animation: 'fadeIn 0.25s ease-out' }}>
        {activeTab === 'overview' && <OverviewTab result={result} />}
        {activeTab === 'categories' && (
          <div className="space-y-3">
            {CATEGORY_ORDER.map(category => (
              <CategoryCard key={category} category={category} detail={result.category_details[category]} />
            ))}
          </div>
        )}
        {activeTab === 'recommendations' && (
          <div className="space-y-3">
            {result.recommendations.map((text, i) => (
              <RecommendationCard key={text} rank={i + 1} text={text} source={findRecommendationSource(result, text)} />
            ))}
          </div>
        )}
      </div>
    </div>
  );
}

function StandingList({ title, icon, entries, empty }: {
  title: string;
  icon: React.ReactNode;
  entries: CategoryStanding[];
  empty: string;
}) {
  return (
    <div className="p-7 rounded-xl bg-bg-card border border-border">
      <div className="flex items-center gap-2.5 mb-4">
        {icon}
        <h3 className="font-semibold text-base">{title}</h3>
      </div>
      {entries.length === 0 ? (
        <p className="text-sm text-text-muted">{empty}</p>
      ) : (
        <ul className="space-y-2">
          {entries.map(entry => (
            <li key={entry.category} className="flex items-center justify-between text-sm">
              <span className="text-text-secondary">{CATEGORY_LABELS[entry.category]}</span>
              <span className="font-mono text-text tabular-nums">{Math.round(entry.percentage)}%</span>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}

function OverviewTab({ result }: { result: AnalysisResult }) {
  return (
    <div className="grid grid-cols-1 lg:grid-cols-2 gap-5">
      <div className="p-7 rounded-xl bg-bg-card border border-border">
        <h3 className="font-semibold text-base mb-6">Category Breakdown</h3>
        <div className="grid grid-cols-3 gap-4">
          {CATEGORY_ORDER.map((category, i) => (
            <ScoreRing
              key={category}
              score={result.categories[category]}
              maxScore={result.category_details[category].max_score}
              size={84}
              label={CATEGORY_LABELS[category]}
              delay={i * 100}
            />
          ))}
        </div>
      </div>
      <div className="p-7 rounded-xl bg-bg-card border border-border">
        <h3 className="font-semibold text-base mb-6">Top Recommendations</h3>
        <ol className="space-y-3">
          {result.summary.top_recommendations.map((text, i) => (
            <li key={text} className="flex items-start gap-3">
              <span className="font-mono text-xs text-accent-light tabular-nums mt-0.5">{i + 1}</span>
              <p className="text-sm text-text-secondary leading-relaxed">{text}</p>
            </li>
          ))}
        </ol>
      </div>
    </div>
  );
}
