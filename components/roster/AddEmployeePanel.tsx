'use client';

import React, { useState } from 'react';
import { useRoster } from '@/lib/roster-context';
import { emptyFormValues, type FormValues } from '@/lib/roster-fields';
import { Button } from '@/components/ui/Button';
import { Card, CardBody, CardHeader } from '@/components/ui/Card';
import EmployeeForm from './EmployeeForm';

export default function AddEmployeePanel() {
  const { snapshot, addEmployee } = useRoster();
  const [values, setValues] = useState<FormValues>(emptyFormValues);

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    if (addEmployee(values)) setValues(emptyFormValues());
  };

  return (
    <Card>
      <CardHeader title="Add Employee" subtitle="Fields marked * are required" />
      <CardBody>
        <form onSubmit={handleSubmit}>
          <EmployeeForm
            table={snapshot}
            values={values}
            onChange={(key, value) => setValues((prev) => ({ ...prev, [key]: value }))}
          />
          <div style={{ display: 'flex', gap: '0.5rem', marginTop: '0.75rem' }}>
            <Button type="submit" variant="accent">Add Employee</Button>
            <Button onClick={() => setValues(emptyFormValues())}>Reset</Button>
          </div>
        </form>
      </CardBody>
    </Card>
  );
}
