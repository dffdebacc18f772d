import { EventEmitter } from "eventemitter3";

export interface PerformanceMetrics {
  recordsProcessed: number;
  reportsEmitted: number;
  lateRecordsDropped: number;
  parseErrors: number;
  averageLatency: number;
  throughput: number;
  memoryUsage: {
    heapUsed: number;
    heapTotal: number;
    external: number;
    rss: number;
  };
  startTime: number;
  uptime: number;
}

export interface PerformanceMonitorEvents {
  metrics: (metrics: PerformanceMetrics) => void;
  highMemoryUsage: (info: { usedMB: number }) => void;
}

function emptyMetrics(now: number): PerformanceMetrics {
  return {
    recordsProcessed: 0,
    reportsEmitted: 0,
    lateRecordsDropped: 0,
    parseErrors: 0,
    averageLatency: 0,
    throughput: 0,
    memoryUsage: {
      heapUsed: 0,
      heapTotal: 0,
      external: 0,
      rss: 0,
    },
    startTime: now,
    uptime: 0,
  };
}

export class PerformanceMonitor extends EventEmitter<PerformanceMonitorEvents> {
  private metrics: PerformanceMetrics;
  private latencies: number[] = [];
  private lastThroughputCheck: number;
  private lastRecordCount = 0;
  private monitoringInterval?: NodeJS.Timeout;

  constructor(private intervalMs: number = 5000, private maxMemoryMB: number = 100) {
    super();
    const now = Date.now();
    this.metrics = emptyMetrics(now);
    this.lastThroughputCheck = now;
  }

  start(): void {
    if (this.monitoringInterval) {
      return;
    }

    this.monitoringInterval = setInterval(() => {
      this.updateMetrics();
      this.emit("metrics", this.getMetrics());
    }, this.intervalMs);

    // Ensure the interval doesn't keep the process alive
    this.monitoringInterval.unref();
  }

  stop(): void {
    if (this.monitoringInterval) {
      clearInterval(this.monitoringInterval);
      this.monitoringInterval = undefined;
    }
  }

  /**
   * @param startTime - wall-clock ms at which the record entered the pipeline
   */
  recordProcessed(startTime: number): void {
    this.metrics.recordsProcessed++;
    this.latencies.push(Date.now() - startTime);

    // Keep only last 1000 latencies
    if (this.latencies.length > 1000) {
      this.latencies.shift();
    }
  }

  recordReport(): void {
    this.metrics.reportsEmitted++;
  }

  recordLateDrop(): void {
    this.metrics.lateRecordsDropped++;
  }

  recordParseError(): void {
    this.metrics.parseErrors++;
  }

  updateMetrics(): void {
    const now = Date.now();
    this.metrics.uptime = now - this.metrics.startTime;

    if (this.latencies.length > 0) {
      const sum = this.latencies.reduce((a, b) => a + b, 0);
      this.metrics.averageLatency = sum / this.latencies.length;
    }

    // Records per second since the previous sample
    const timeDiff = (now - this.lastThroughputCheck) / 1000;
    const recordDiff = this.metrics.recordsProcessed - this.lastRecordCount;
    this.metrics.throughput = timeDiff > 0 ? recordDiff / timeDiff : 0;

    this.lastThroughputCheck = now;
    this.lastRecordCount = this.metrics.recordsProcessed;

    const memUsage = process.memoryUsage();
    this.metrics.memoryUsage = {
      heapUsed: memUsage.heapUsed,
      heapTotal: memUsage.heapTotal,
      external: memUsage.external,
      rss: memUsage.rss,
    };

    const memoryMB = memUsage.heapUsed / 1024 / 1024;
    if (memoryMB > this.maxMemoryMB) {
      this.emit("highMemoryUsage", { usedMB: memoryMB });
    }
  }

  getMetrics(): PerformanceMetrics {
    return { ...this.metrics, memoryUsage: { ...this.metrics.memoryUsage } };
  }

  reset(): void {
    const now = Date.now();
    this.metrics = emptyMetrics(now);
    this.latencies = [];
    this.lastThroughputCheck = now;
    this.lastRecordCount = 0;
  }
}
