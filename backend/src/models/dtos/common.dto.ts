/**
 * Envelope and health payloads shared by every route.
 */

// ============================================================================
// API Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// ============================================================================
// Health Check
// ============================================================================

export interface HealthCheckResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  services: {
    database: ServiceHealth;
    redis: ServiceHealth;
  };
  memory: NodeJS.MemoryUsage;
}

export interface ServiceHealth {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}
