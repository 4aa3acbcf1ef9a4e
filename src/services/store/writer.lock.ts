import { StoreBusyError } from '../../utils/errors.js';

/**
 * 单写入者锁。已被持有时立即失败而不是排队等待。
 */
export class WriterLock {
  private held = false;

  get isHeld(): boolean {
    return this.held;
  }

  acquire(): () => void {
    if (this.held) {
      throw new StoreBusyError();
    }
    this.held = true;
    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.held = false;
      }
    };
  }

  async runExclusive<T>(work: () => Promise<T>): Promise<T> {
    const release = this.acquire();
    try {
      return await work();
    } finally {
      release();
    }
  }
}
