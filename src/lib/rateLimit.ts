import Bottleneck from 'bottleneck';

export function createLoadLimiter(maxConcurrent: number): Bottleneck {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent <= 0) {
    throw new Error(`maxConcurrent must be a positive integer (received ${maxConcurrent}).`);
  }
  return new Bottleneck({
    maxConcurrent
  });
}
