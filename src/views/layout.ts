import escapeHtml from "escape-html";

export { escapeHtml };

const STYLE = `body{font-family:system-ui,-apple-system,Segoe UI,Roboto,Ubuntu,Cantarell,Noto Sans,sans-serif;max-width:760px;margin:24px auto;padding:0 12px;line-height:1.5}
h1{font-size:1.5rem}h2{font-size:1.15rem;margin:1.2rem 0 .4rem}
nav a{margin-right:.8rem}nav a.active{font-weight:700}
.card{border:1px solid #ddd;border-radius:8px;padding:10px 12px;margin:10px 0}
.stats{color:#555;font-size:.9rem}.error{color:#b00020}
input[type=number]{width:6rem}form.inline{display:inline}
table{border-collapse:collapse}td,th{padding:2px 10px 2px 0;text-align:left}`;

/** Wraps `body` (already escaped HTML) in the page shell. */
export function page(title: string, body: string): string {
  return `<!doctype html><html><head><meta charset="utf-8"><meta name="viewport" content="width=device-width, initial-scale=1" /><title>${escapeHtml(title)}</title><style>${STYLE}</style></head><body>${body}</body></html>`;
}

export function hiddenInput(name: string, value: string | number): string {
  return `<input type="hidden" name="${escapeHtml(name)}" value="${escapeHtml(String(value))}">`;
}
