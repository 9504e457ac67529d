'use client';

/**
 * @fileoverview Roster file upload.
 *
 * Accepts .xlsx / .xls / .csv; the parsed table replaces the session
 * roster. A failed parse leaves the current roster untouched.
 */

import React, { useRef, useState } from 'react';
import { useRoster } from '@/lib/roster-context';
import { Button } from '@/components/ui/Button';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';

export default function UploadPanel() {
  const { uploadFile, clearAll, snapshot, originalCount, lastChange } = useRoster();
  const fileRef = useRef<HTMLInputElement>(null);
  const [busy, setBusy] = useState(false);

  const handleFile = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    e.target.value = '';
    if (!file) return;
    setBusy(true);
    try {
      await uploadFile(file);
    } finally {
      setBusy(false);
    }
  };

  const rowCount = snapshot.rows.length;
  const added = rowCount - originalCount;

  return (
    <Card>
      <CardHeader
        title="Roster File"
        subtitle={lastChange?.source ? `Loaded from ${lastChange.source}` : 'Upload an Excel or CSV roster to begin'}
      />
      <CardBody>
        <div style={{ display: 'flex', gap: '0.5rem', alignItems: 'center', flexWrap: 'wrap' }}>
          <Button variant="accent" loading={busy} onClick={() => fileRef.current?.click()}>
            Upload File
          </Button>
          <input
            ref={fileRef}
            type="file"
            accept=".xlsx,.xls,.csv"
            style={{ display: 'none' }}
            onChange={(e) => void handleFile(e)}
          />
          <Button variant="danger" onClick={clearAll} disabled={rowCount === 0 && snapshot.columns.length === 0}>
            Clear Data
          </Button>
          <span style={{ fontSize: '0.75rem', color: 'var(--text-muted)' }}>
            {rowCount} record{rowCount === 1 ? '' : 's'}
            {added > 0 && ` (${added} added this session)`}
          </span>
        </div>
      </CardBody>
    </Card>
  );
}
