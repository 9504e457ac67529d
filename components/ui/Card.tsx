'use client';

import React from 'react';

interface CardProps {
  children: React.ReactNode;
  className?: string;
}

export const Card = React.memo(({ children, className = '' }: CardProps) => {
  return <section className={`glass-solid card ${className}`}>{children}</section>;
});

Card.displayName = 'Card';

interface CardHeaderProps {
  title: string;
  subtitle?: string;
  action?: React.ReactNode;
}

export const CardHeader: React.FC<CardHeaderProps> = ({ title, subtitle, action }) => {
  return (
    <div className="card-header">
      <div>
        <h3 className="card-title">{title}</h3>
        {subtitle && <p className="card-subtitle">{subtitle}</p>}
      </div>
      {action && <div>{action}</div>}
    </div>
  );
};

interface CardBodyProps {
  children: React.ReactNode;
  noPadding?: boolean;
}

export const CardBody: React.FC<CardBodyProps> = ({ children, noPadding = false }) => {
  return <div className={noPadding ? undefined : 'card-body'}>{children}</div>;
};
