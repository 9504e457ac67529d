'use client';

import React from 'react';
import { useRoster } from '@/lib/roster-context';

const TONES = {
  ok: { bg: 'rgba(16,185,129,0.1)', fg: 'var(--color-success)', border: 'rgba(16,185,129,0.25)' },
  err: { bg: 'rgba(239,68,68,0.1)', fg: 'var(--color-error)', border: 'rgba(239,68,68,0.25)' },
  info: { bg: 'rgba(59,130,246,0.1)', fg: 'var(--color-info)', border: 'rgba(59,130,246,0.25)' },
} as const;

export default function NoticeBanner() {
  const { notice, dismissNotice } = useRoster();
  if (!notice) return null;
  const tone = TONES[notice.type];

  return (
    <div
      role={notice.type === 'err' ? 'alert' : 'status'}
      style={{
        display: 'flex', justifyContent: 'space-between', alignItems: 'center', gap: '0.75rem',
        padding: '0.5rem 0.75rem', marginBottom: '0.75rem', borderRadius: 'var(--radius-sm)', fontSize: '0.78rem',
        background: tone.bg, color: tone.fg, border: `1px solid ${tone.border}`,
      }}
    >
      <span>{notice.text}</span>
      <button type="button" className="btn btn-sm" onClick={dismissNotice} aria-label="Dismiss">×</button>
    </div>
  );
}
