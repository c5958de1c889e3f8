// src/lib/renderMarkdown.ts

// Model replies are markdown-ish text. This turns the subset the system prompt
// asks for into HTML with a fixed sequence of substitutions. Input is escaped
// first, so every tag in the output comes from these rules.

export const RENDER_CLASSES = {
  pre: "my-2.5 overflow-x-auto rounded-md border border-gray-200 bg-gray-50 px-3.5 py-3 text-xs leading-relaxed",
  code: "rounded border border-gray-200 bg-gray-50 px-1.5 py-px text-[0.77rem]",
  h1: "mt-3.5 mb-2 font-serif text-lg",
  h2: "mt-3.5 mb-2 border-b border-gray-200 pb-1 text-sm font-medium",
  h3: "mt-3 mb-1 text-xs font-medium uppercase tracking-widest text-blue-600",
  hr: "my-3 border-t border-gray-200",
  quote: "my-1.5 border-l-[3px] border-blue-400 px-3 py-1.5 text-xs italic text-gray-500",
  listRow: "my-1 flex items-start gap-2.5",
  number: "min-w-[18px] shrink-0 text-xs text-gray-400",
  bullet: "shrink-0 text-blue-600",
};

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function renderMarkdown(text: string): string {
  let h = escapeHtml(text);

  h = h.replace(
    /```([a-z]*)\n?([\s\S]*?)```/g,
    (_match, _lang: string, code: string) =>
      `<pre class="${RENDER_CLASSES.pre}"><code>${code.trim()}</code></pre>`
  );
  h = h.replace(/`([^`\n]+)`/g, `<code class="${RENDER_CLASSES.code}">$1</code>`);

  h = h.replace(/\*\*([^*\n]+)\*\*/g, "<strong>$1</strong>");
  h = h.replace(/\*([^*\n]+)\*/g, "<em>$1</em>");

  h = h.replace(/^# (.+)$/gm, `<div class="${RENDER_CLASSES.h1}">$1</div>`);
  h = h.replace(/^## (.+)$/gm, `<div class="${RENDER_CLASSES.h2}">$1</div>`);
  h = h.replace(/^### (.+)$/gm, `<div class="${RENDER_CLASSES.h3}">$1</div>`);

  h = h.replace(/🔴\s*high/gi, '<span class="risk-tag high">🔴 HIGH</span>');
  h = h.replace(/🟡\s*medium/gi, '<span class="risk-tag medium">🟡 MEDIUM</span>');
  h = h.replace(/🟢\s*low/gi, '<span class="risk-tag low">🟢 LOW</span>');

  h = h.replace(/^-{3,}$/gm, `<hr class="${RENDER_CLASSES.hr}"/>`);

  // "> " was escaped above
  h = h.replace(/^&gt; (.+)$/gm, `<div class="${RENDER_CLASSES.quote}">$1</div>`);

  h = h.replace(
    /^(\d+)\.\s+(.+)$/gm,
    `<div class="${RENDER_CLASSES.listRow}"><span class="${RENDER_CLASSES.number}">$1.</span><span>$2</span></div>`
  );
  h = h.replace(
    /^[-*•]\s+(.+)$/gm,
    `<div class="${RENDER_CLASSES.listRow}"><span class="${RENDER_CLASSES.bullet}">›</span><span>$1</span></div>`
  );

  return h.replace(/\n/g, "<br/>");
}
