'use client';

import React from 'react';
import { useRoster } from '@/lib/roster-context';
import { FILTER_COLUMNS, hasActiveFilters } from '@/lib/filter-utils';
import { Button } from '@/components/ui/Button';

export default function FilterBar() {
  const { views, filters, setFilter, resetFilters, snapshot } = useRoster();
  const visible = FILTER_COLUMNS.filter((col) => snapshot.columns.includes(col));

  if (visible.length === 0) return null;

  return (
    <div className="filter-bar">
      {visible.map((col) => (
        <label key={col} className="filter-field">
          <span className="filter-label">{col}</span>
          <select
            multiple
            value={filters[col] ?? []}
            onChange={(e) => setFilter(col, Array.from(e.target.selectedOptions, (o) => o.value))}
          >
            {(views.filterOptions[col] ?? []).map((opt) => (
              <option key={opt} value={opt}>{opt}</option>
            ))}
          </select>
        </label>
      ))}
      <div style={{ display: 'flex', flexDirection: 'column', justifyContent: 'flex-end', gap: '0.35rem' }}>
        <span style={{ fontSize: '0.72rem', color: 'var(--text-muted)' }}>
          {views.filteredRows.length} of {snapshot.rows.length} shown
        </span>
        {hasActiveFilters(filters) && (
          <Button size="sm" onClick={resetFilters}>Clear filters</Button>
        )}
      </div>
    </div>
  );
}
