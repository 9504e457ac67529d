'use client';

/**
 * @fileoverview Employee grid with free-text search and incremental paging.
 * Rows shown are the filtered rows (or every row when filters are switched
 * off here), narrowed by the search term.
 */

import React, { useMemo, useState } from 'react';
import { useRoster } from '@/lib/roster-context';
import { searchRecords } from '@/lib/filter-utils';
import { cellToText } from '@/lib/data-normalization';
import { Button } from '@/components/ui/Button';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';

const PAGE_SIZE = 100;

export default function RosterTable() {
  const { views, snapshot } = useRoster();
  const [search, setSearch] = useState('');
  const [applyFilters, setApplyFilters] = useState(true);
  const [visibleCount, setVisibleCount] = useState(PAGE_SIZE);

  const base = applyFilters ? views.filteredRows : snapshot.rows;
  const matched = useMemo(() => searchRecords(base, search), [base, search]);
  const visibleRows = matched.slice(0, visibleCount);
  const hasMore = matched.length > visibleCount;

  return (
    <Card>
      <CardHeader
        title="Employee Roster"
        subtitle={`${snapshot.columns.length} columns`}
        action={
          <label style={{ fontSize: '0.75rem', display: 'flex', gap: '0.35rem', alignItems: 'center' }}>
            <input
              type="checkbox"
              checked={applyFilters}
              onChange={(e) => { setApplyFilters(e.target.checked); setVisibleCount(PAGE_SIZE); }}
            />
            Apply filters
          </label>
        }
      />
      <CardBody>
        <input
          className="text-input"
          placeholder="Search name, email, role…"
          value={search}
          onChange={(e) => { setSearch(e.target.value); setVisibleCount(PAGE_SIZE); }}
          style={{ width: '100%', marginBottom: '0.75rem' }}
        />
        <div style={{ overflow: 'auto', maxHeight: 'calc(100vh - 320px)' }}>
          <table className="dm-table">
            <thead>
              <tr>
                <th style={{ width: 48 }}>#</th>
                {snapshot.columns.map((col) => <th key={col}>{col}</th>)}
              </tr>
            </thead>
            <tbody>
              {visibleRows.map((row, i) => (
                <tr key={i}>
                  <td style={{ color: 'var(--text-muted)' }}>{i + 1}</td>
                  {snapshot.columns.map((col) => (
                    <td key={col}>{cellToText(row[col] ?? null)}</td>
                  ))}
                </tr>
              ))}
              {visibleRows.length === 0 && (
                <tr><td colSpan={snapshot.columns.length + 1} className="empty-cell">No rows.</td></tr>
              )}
            </tbody>
          </table>
        </div>
        <div style={{
          display: 'flex', justifyContent: 'space-between', alignItems: 'center',
          marginTop: '0.5rem', fontSize: '0.72rem', color: 'var(--text-muted)',
        }}>
          <span>Showing {visibleRows.length} of {matched.length} row{matched.length !== 1 ? 's' : ''}</span>
          {hasMore && (
            <Button size="sm" onClick={() => setVisibleCount((n) => n + PAGE_SIZE)}>
              Load more ({Math.min(PAGE_SIZE, matched.length - visibleCount)} rows)
            </Button>
          )}
        </div>
      </CardBody>
    </Card>
  );
}
