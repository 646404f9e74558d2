'use client';

import { Zap, ArrowUp, Clock, Lightbulb } from 'lucide-react';
import { CATEGORY_LABELS, RuleResultPayload, Severity } from '@/lib/types';

const SEVERITY_CONFIG = {
  high: { color: 'var(--color-score-fail)', icon: Zap, label: 'High' },
  medium: { color: 'var(--color-score-warn)', icon: ArrowUp, label: 'Medium' },
  low: { color: 'var(--color-accent)', icon: Clock, label: 'Low' },
} satisfies Record<Severity, unknown>;

export function SeverityBadge({ severity }: { severity: Severity }) {
  const s = SEVERITY_CONFIG[severity];
  return (
    <span
      className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest"
      style={{ background: `color-mix(in srgb, ${s.color} 8%, transparent)`, color: s.color }}
    >
      {s.label}
    </span>
  );
}

interface RecommendationCardProps {
  rank: number;
  text: string;
  // The fired rule this advice came from; absent for general advice.
  source?: RuleResultPayload;
}

export function RecommendationCard({ rank, text, source }: RecommendationCardProps) {
  const color = source ? SEVERITY_CONFIG[source.severity].color : 'var(--color-text-muted)';
  const Icon = source ? SEVERITY_CONFIG[source.severity].icon : Lightbulb;

  return (
    <div className="rounded-xl bg-bg-card p-5 hover:bg-bg-elevated/50 transition-all ring-1 ring-transparent hover:ring-border">
      <div className="flex items-start gap-4">
        <div
          className="shrink-0 w-9 h-9 rounded-lg flex items-center justify-center"
          style={{ background: `color-mix(in srgb, ${color} 8%, transparent)` }}
        >
          <Icon size={16} style={{ color }} />
        </div>
        <div className="flex-1 min-w-0">
          <div className="flex items-center gap-2 flex-wrap mb-1.5">
            <span className="font-mono text-xs text-text-muted tabular-nums">#{rank}</span>
            {source ? (
              <>
                <SeverityBadge severity={source.severity} />
                <span className="text-[11px] text-text-muted">{CATEGORY_LABELS[source.category]}</span>
              </>
            ) : (
              <span className="text-[11px] text-text-muted">General advice</span>
            )}
          </div>
          <p className="text-sm text-text leading-relaxed">{text}</p>
          {source && (
            <p className="text-xs text-text-secondary mt-1.5">{source.description}</p>
          )}
        </div>
      </div>
    </div>
  );
}
