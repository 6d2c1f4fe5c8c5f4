/**
 * An attempt was made to read or write a half past the end of a byte
 * array.
 */
export class TruncationError extends Error {
  public readonly start: number;
  public readonly requested: number;
  public readonly size: number;

  /**
   * Create a truncation error.
   *
   * @param start The starting offset for the access.
   * @param requested The number of bytes requested.
   * @param size The total size of the byte array.
   */
  public constructor(start: number, requested: number, size: number) {
    super(`Buffer truncated, ${start} + ${requested} > ${size}`);
    this.name = 'TruncationError';
    this.start = start;
    this.requested = requested;
    this.size = size;
  }
}
