const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/** Tooltip shown on a cluster polygon. */
export function clusterTooltip(clusterId: number, size: number, tags: readonly string[]): string {
  return `Cluster&nbsp;${clusterId}&nbsp;(n=${size})<br/>Tags: ${tags.map(escapeHtml).join(', ')}`;
}

/** Popup shown on a point marker. */
export function markerPopup(clusterId: number, url: string): string {
  return `Cluster:&nbsp;${clusterId}<br/><a href='${escapeHtml(url)}' target='_blank'>link</a>`;
}
