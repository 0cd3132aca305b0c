/** `data-time` attributes carry unix seconds; anything else is rejected. */
export function fromUnixSeconds(raw: string | undefined): Date | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  return new Date(Number(raw) * 1000);
}

export function parseCount(raw: string | undefined): number {
  const n = parseInt((raw ?? '').replace(/[,.\s]/g, ''), 10);
  return Number.isNaN(n) ? 0 : n;
}
