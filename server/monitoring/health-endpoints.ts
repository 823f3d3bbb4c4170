/**
 * Health Endpoints
 * Liveness for load balancers
 */

import { Request, Response } from 'express';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  uptime: number;
}

export class HealthMonitor {
  private startTime: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  /**
   * Seconds since the monitor was created
   */
  getStatus(): HealthStatus {
    const current = this.now();
    return {
      status: 'ok',
      timestamp: new Date(current).toISOString(),
      uptime: Math.floor((current - this.startTime) / 1000)
    };
  }

  health = (_req: Request, res: Response): void => {
    res.json(this.getStatus());
  };
}
