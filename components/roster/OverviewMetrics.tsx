'use client';

import React from 'react';
import { useRoster } from '@/lib/roster-context';
import { getRosterConfig } from '@/lib/roster-config';

interface MetricTileProps {
  label: string;
  value: number;
  hint?: string;
}

const MetricTile = React.memo(({ label, value, hint }: MetricTileProps) => (
  <div className="metric-card">
    <div className="metric-label">{label}</div>
    <div className="metric-value">{value.toLocaleString()}</div>
    {hint && <div className="metric-hint">{hint}</div>}
  </div>
));

MetricTile.displayName = 'MetricTile';

export default function OverviewMetrics() {
  const { views } = useRoster();
  const { metrics } = views;
  const windowDays = getRosterConfig().recentHireWindowDays;

  return (
    <div className="metric-grid">
      <MetricTile label="Total Employees" value={metrics.totalEmployees} />
      <MetricTile label="Recent Hires" value={metrics.recentHires} hint={`Last ${windowDays} days`} />
      <MetricTile label="Boot Camp Classes" value={metrics.bootCampClasses} />
      <MetricTile label="VILT Classes" value={metrics.viltClasses} />
    </div>
  );
}
