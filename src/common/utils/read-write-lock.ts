import { Semaphore } from 'async-mutex';

const MAX_READERS = 1024;
const WRITER_PRIORITY = 1;

/**
 * Many concurrent readers or a single writer, built on a weighted semaphore.
 * Writers take every permit and queue ahead of later readers.
 */
export class ReadWriteLock {
  private readonly semaphore = new Semaphore(MAX_READERS);

  read<T>(callback: () => Promise<T> | T): Promise<T> {
    return this.semaphore.runExclusive(() => callback(), 1);
  }

  write<T>(callback: () => Promise<T> | T): Promise<T> {
    return this.semaphore.runExclusive(() => callback(), MAX_READERS, WRITER_PRIORITY);
  }
}
