/**
 * Delay execution for specified milliseconds
 */
export async function delay(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise(resolve => setTimeout(resolve, ms));
}
