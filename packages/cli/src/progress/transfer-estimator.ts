/**
 * Transfer rate and time-remaining estimation
 * Uses a rolling window of byte-count samples
 */

interface TransferSample {
  timestamp: number;
  downloaded: number;
}

export class TransferEstimator {
  private samples: TransferSample[] = [];
  private readonly windowSize: number;

  /**
   * @param windowSize Number of samples kept for the rolling rate (default: 10)
   */
  constructor(windowSize: number = 10) {
    this.windowSize = windowSize;
  }

  /**
   * Record the downloaded byte count at the current time
   */
  record(downloaded: number): void {
    this.samples.push({ timestamp: Date.now(), downloaded });

    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
  }

  /**
   * Bytes per second over the window, or null with fewer than 2 samples
   */
  bytesPerSecond(): number | null {
    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    if (!first || !last || this.samples.length < 2) {
      return null;
    }

    const timeDelta = last.timestamp - first.timestamp;
    const bytesDelta = last.downloaded - first.downloaded;
    if (bytesDelta <= 0 || timeDelta <= 0) {
      return null;
    }

    return (bytesDelta / timeDelta) * 1000;
  }

  /**
   * Estimate remaining milliseconds, or null if the rate is unknown
   */
  estimateRemaining(downloaded: number, total: number): number | null {
    const rate = this.bytesPerSecond();
    if (rate === null) {
      return null;
    }

    const remaining = total - downloaded;
    if (remaining <= 0) {
      return 0;
    }

    return Math.round((remaining / rate) * 1000);
  }

  reset(): void {
    this.samples = [];
  }

  getSampleCount(): number {
    return this.samples.length;
  }
}
