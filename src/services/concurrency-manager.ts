/**
 * Concurrency Manager for the ledger node
 * Serializes block submissions so exactly one appendBlock runs at a time,
 * while account and chain queries proceed without waiting
 */

interface QueuedOperation {
  run: () => Promise<void>;
  reject: (error: Error) => void;
}

export interface ConcurrencyStatus {
  queueLength: number;
  isProcessingBlocks: boolean;
}

export class ConcurrencyManager {
  private blockProcessingQueue: QueuedOperation[] = [];
  private isProcessingBlocks = false;

  /**
   * Queue a block operation to ensure sequential execution
   * @param operation The block processing function to execute
   * @returns Promise that resolves when the operation completes
   */
  queueBlockOperation<T>(operation: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.blockProcessingQueue.push({
        run: async () => {
          try {
            resolve(await operation());
          } catch (error) {
            reject(error instanceof Error ? error : new Error(String(error)));
          }
        },
        reject
      });

      void this.processQueue();
    });
  }

  /**
   * Get current queue status for monitoring
   */
  getStatus(): ConcurrencyStatus {
    return {
      queueLength: this.blockProcessingQueue.length,
      isProcessingBlocks: this.isProcessingBlocks
    };
  }

  /**
   * Clear the queue (on shutdown)
   * This will reject all queued operations
   */
  clearQueue(): void {
    const error = new Error('Queue cleared - operation cancelled');

    while (this.blockProcessingQueue.length > 0) {
      const operation = this.blockProcessingQueue.shift();
      if (operation) {
        operation.reject(error);
      }
    }
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessingBlocks) {
      return;
    }

    this.isProcessingBlocks = true;

    try {
      while (this.blockProcessingQueue.length > 0) {
        const queuedOperation = this.blockProcessingQueue.shift();
        if (queuedOperation) {
          await queuedOperation.run();
        }
      }
    } finally {
      this.isProcessingBlocks = false;
    }
  }
}

// Singleton instance for application-wide use
export const concurrencyManager = new ConcurrencyManager();
