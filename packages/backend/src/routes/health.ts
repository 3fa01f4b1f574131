import type { FastifyInstance } from 'fastify';
import type { Environment } from '../config/index.js';

export interface HealthRouteOptions {
  environment: Environment;
}

interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  environment: Environment;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions): Promise<void> {
  // GET /health - Liveness only, no upstream calls
  app.get('/', async (): Promise<HealthStatus> => {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment: opts.environment,
    };
  });
}
