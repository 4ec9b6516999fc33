export function formatCount(count: number): string {
  if (count >= 1000) {
    return `${(Math.floor(count / 100) / 10).toFixed(1)}k`;
  }
  return String(count);
}
