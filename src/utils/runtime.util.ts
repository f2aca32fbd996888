import { randomUUID } from 'crypto';

let correlationId: string | undefined;

export function getCorrelationId(): string | undefined {
  return correlationId;
}

export function initializeCorrelationId(): string {
  if (correlationId) {
    return correlationId;
  }
  correlationId = randomUUID();
  return correlationId;
}
