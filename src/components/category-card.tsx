'use client';

import { useState } from 'react';
import { ChevronDown, ChevronRight, Check, X } from 'lucide-react';
import { Category, CATEGORY_LABELS, CategoryDetailPayload } from '@/lib/types';
import { getScoreColor } from './score-ring';
import { SeverityBadge } from './recommendation-card';

interface CategoryCardProps {
  category: Category;
  detail: CategoryDetailPayload;
}

export function CategoryCard({ category, detail }: CategoryCardProps) {
  const [expanded, setExpanded] = useState(false);
  const percentage = detail.max_score > 0 ? (detail.score / detail.max_score) * 100 : 0;
  const color = getScoreColor(percentage);

  return (
    <div className={`rounded-xl bg-bg-card overflow-hidden transition-all ${
      expanded ? 'ring-1 ring-border-bright' : 'ring-1 ring-transparent hover:ring-border'
    }`}>
      <button
        onClick={() => setExpanded(!expanded)}
        className="w-full flex items-center gap-4 px-5 py-4 text-left transition-colors hover:bg-bg-elevated/50"
      >
        <div className="flex-1 min-w-0">
          <div className="flex items-center gap-2.5">
            <h3 className="font-semibold text-text text-[15px] truncate">{CATEGORY_LABELS[category]}</h3>
            <span className="text-[11px] text-text-muted">
              {detail.rules.length === 0 ? 'No issues' : `${detail.rules.length} issue${detail.rules.length === 1 ? '' : 's'}`}
            </span>
          </div>
          <div className="flex items-center gap-3 mt-2">
            <div className="flex-1 h-1 bg-white/[0.04] rounded-full overflow-hidden">
              <div
                className="h-full rounded-full transition-all duration-1000"
                style={{ width: `${percentage}%`, background: color }}
              />
            </div>
            <span className="text-xs font-mono text-text-secondary tabular-nums">
              {detail.score}/{detail.max_score}
            </span>
          </div>
        </div>
        <span className="text-text-muted ml-1">
          {expanded ? <ChevronDown size={16} /> : <ChevronRight size={16} />}
        </span>
      </button>

      {expanded && (
        <div className="border-t border-white/[0.04] px-5 py-4 space-y-1.5" style={{ animation: 'fadeIn 0.2s ease-out' }}>
          {detail.rules.length === 0 && (
            <div className="flex items-center gap-3 py-2 px-3">
              <span className="flex items-center justify-center w-5 h-5 rounded-full bg-score-pass-dim">
                <Check size={11} className="text-score-pass" strokeWidth={3} />
              </span>
              <p className="text-sm text-text-secondary">Every rule in this category passed.</p>
            </div>
          )}
          {detail.rules.map(rule => (
            <div key={rule.rule_id} className="flex items-start gap-3 py-2 px-3 rounded-lg hover:bg-bg-elevated/30 transition-colors">
              <span className="mt-0.5 shrink-0 flex items-center justify-center w-5 h-5 rounded-full bg-score-fail-dim">
                <X size={11} className="text-score-fail" strokeWidth={3} />
              </span>
              <div className="min-w-0 flex-1">
                <div className="flex items-center gap-2">
                  <span className="text-sm font-medium text-text">{rule.description}</span>
                  <SeverityBadge severity={rule.severity} />
                  <span className="text-[11px] font-mono text-text-muted tabular-nums">{rule.score_impact}</span>
                </div>
                <p className="text-xs text-text-secondary mt-0.5 leading-relaxed">{rule.recommendation}</p>
              </div>
            </div>
          ))}
        </div>
      )}
    </div>
  );
}
