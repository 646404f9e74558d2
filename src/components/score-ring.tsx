'use client';

import { useEffect, useState } from 'react';
import { getTier, ScoreTier, TIER_LABELS } from '@/lib/types';

interface ScoreRingProps {
  score: number;
  maxScore?: number;
  size?: number;
  label?: string;
  delay?: number;
}

export function ScoreRing({ score, maxScore = 100, size = 120, label, delay = 0 }: ScoreRingProps) {
  const [visible, setVisible] = useState(delay === 0);
  const percentage = maxScore > 0 ? (score / maxScore) * 100 : 0;
  const radius = 42;
  const circumference = 2 * Math.PI * radius;
  const offset = circumference - (percentage / 100) * circumference;
  const color = getScoreColor(percentage);
  const tier = getTier(percentage);

  useEffect(() => {
    if (delay > 0) {
      const t = setTimeout(() => setVisible(true), delay);
      return () => clearTimeout(t);
    }
  }, [delay]);

  if (!visible) {
    return (
      <div className="flex flex-col items-center gap-3" style={{ width: size }}>
        <div style={{ width: size, height: size }} />
        {label && <span className="text-[11px] text-text-secondary font-medium tracking-widest uppercase">{label}</span>}
      </div>
    );
  }

  return (
    <div className="flex flex-col items-center gap-3" style={{ animation: 'countUp 0.5s ease-out' }}>
      <div className="relative" style={{ width: size, height: size }}>
        <svg viewBox="0 0 100 100" className="transform -rotate-90" style={{ width: size, height: size }}>
          <circle
            cx="50" cy="50" r={radius}
            fill="none"
            strokeWidth="6"
            style={{ stroke: 'var(--color-track)' }}
          />
          <circle
            cx="50" cy="50" r={radius}
            fill="none"
            strokeWidth="6"
            strokeLinecap="round"
            strokeDasharray={circumference}
            strokeDashoffset={offset}
            style={{
              stroke: color,
              animation: 'scoreRingFill 1.8s cubic-bezier(0.16, 1, 0.3, 1) forwards',
            }}
          />
        </svg>
        <div className="absolute inset-0 flex flex-col items-center justify-center">
          <span className="font-mono text-3xl font-bold tracking-tight" style={{ color }}>{score}</span>
          {maxScore !== 100 && (
            <span className="text-[10px] font-mono text-text-muted">/ {maxScore}</span>
          )}
        </div>
      </div>
      <TierBadge tier={tier} />
      {label && <span className="text-[11px] text-text-secondary font-medium tracking-widest uppercase">{label}</span>}
    </div>
  );
}

export function getScoreColor(percentage: number): string {
  if (percentage >= 80) return 'var(--color-score-pass)';
  if (percentage >= 60) return 'var(--color-score-warn)';
  if (percentage >= 40) return 'var(--color-score-caution)';
  return 'var(--color-score-fail)';
}

const TIER_COLORS: Record<ScoreTier, string> = {
  excellent: 'var(--color-score-pass)',
  good: 'var(--color-score-warn)',
  fair: 'var(--color-score-caution)',
  poor: 'var(--color-score-fail)',
};

export function TierBadge({ tier }: { tier: ScoreTier }) {
  const color = TIER_COLORS[tier];
  return (
    <span
      className="text-[10px] font-semibold px-2 py-0.5 rounded-full tracking-wide"
      style={{ background: `color-mix(in srgb, ${color} 8%, transparent)`, color }}
    >
      {TIER_LABELS[tier]}
    </span>
  );
}
