export type HealthStatus = 'healthy' | 'unhealthy';
