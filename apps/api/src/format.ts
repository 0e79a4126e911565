/** `2026-03-01 08:05:09`, always UTC. */
export function formatTimestamp(value: Date): string {
  return value.toISOString().slice(0, 19).replace("T", " ");
}

/** `KSh 45,000` */
export function formatKsh(amount: number): string {
  return `KSh ${String(Math.trunc(amount)).replace(/\B(?=(\d{3})+(?!\d))/g, ",")}`;
}

/** `masinga-central` → `Masinga Central` */
export function formatWard(ward: string): string {
  return ward
    .split("-")
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
