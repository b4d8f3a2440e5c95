export type ComponentHealth = {
  readonly ok: boolean;
  readonly details: string;
};

export type AppHealthStatus = {
  readonly status: 'ok' | 'degraded';
  readonly telegram: ComponentHealth;
  readonly dispatcher: ComponentHealth;
};
