/** Formats an integer yen amount, e.g. 1280 → "¥1,280" and -300 → "-¥300". */
export function formatYen(amount: number): string {
  const digits = Math.abs(Math.trunc(amount)).toLocaleString('en-US')
  return amount < 0 ? `-¥${digits}` : `¥${digits}`
}
