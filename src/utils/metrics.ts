import client from 'prom-client';

client.collectDefaultMetrics();

export const register = client.register;

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.05, 0.1, 0.3, 1, 3, 5]
});

export const authorizationDecisions = new client.Counter({
  name: 'authorization_decisions_total',
  help: 'Authorization decisions by outcome',
  labelNames: ['outcome']
});

export const trackRequest = (labels: { method: string; route: string; status: string }, duration: number): void => {
  httpRequestDuration.observe(labels, duration);
};

export type AuthorizationOutcome = 'system' | 'unregistered' | 'granted' | 'denied';

export const trackAuthorization = (outcome: AuthorizationOutcome): void => {
  authorizationDecisions.inc({ outcome });
};
