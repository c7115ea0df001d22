function isEnabled(): boolean {
  const flag = process.env.WORD_SOLVER_DEBUG;
  return flag === '1' || flag === 'true';
}

export function debugLog(...args: unknown[]): void {
  if (isEnabled()) {
    console.debug('[word-solver]', ...args);
  }
}
