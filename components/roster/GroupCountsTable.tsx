'use client';

import React from 'react';
import type { GroupCount } from '@/types/roster';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';

interface GroupCountsTableProps {
  title: string;
  subtitle?: string;
  valueLabel: string;
  counts: GroupCount[];
  countLabel?: string;
}

export default function GroupCountsTable({ title, subtitle, valueLabel, counts, countLabel = 'Employees' }: GroupCountsTableProps) {
  const total = counts.reduce((sum, c) => sum + c.count, 0);

  return (
    <Card>
      <CardHeader title={title} subtitle={subtitle} />
      <CardBody noPadding>
        <table className="dm-table">
          <thead>
            <tr>
              <th>{valueLabel}</th>
              <th style={{ textAlign: 'right' }}>{countLabel}</th>
              <th style={{ width: '40%' }} />
            </tr>
          </thead>
          <tbody>
            {counts.map((c) => (
              <tr key={c.value}>
                <td>{c.value}</td>
                <td style={{ textAlign: 'right' }}>{c.count}</td>
                <td>
                  <div className="bar-track">
                    <div className="bar-fill" style={{ width: `${total ? (c.count / total) * 100 : 0}%` }} />
                  </div>
                </td>
              </tr>
            ))}
            {counts.length === 0 && (
              <tr><td colSpan={3} className="empty-cell">No data.</td></tr>
            )}
          </tbody>
        </table>
      </CardBody>
    </Card>
  );
}
