'use client';

import React from 'react';
import { useRoster } from '@/lib/roster-context';
import { Button } from '@/components/ui/Button';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';

export default function ExportPanel() {
  const { snapshot, downloadCsv, downloadXlsx } = useRoster();
  const empty = snapshot.columns.length === 0;

  return (
    <Card>
      <CardHeader title="Export" subtitle="Full roster, every column, including session edits" />
      <CardBody>
        <div style={{ display: 'flex', gap: '0.5rem' }}>
          <Button onClick={downloadCsv} disabled={empty}>Download CSV</Button>
          <Button variant="accent" onClick={downloadXlsx} disabled={empty}>Download Excel</Button>
        </div>
      </CardBody>
    </Card>
  );
}
