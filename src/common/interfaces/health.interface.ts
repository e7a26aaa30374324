export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  service: string;
  trading: 'running' | 'stopped';
  mode: 'simulation' | 'live';
}
