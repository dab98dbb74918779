export const EMAIL_BRAND_DEFAULTS = {
  brandColorStart: "#0f766e",
  brandColorEnd: "#14b8a6",
} as const;

export interface RenderEmailOptions {
  heading: string;
  bodyHtml: string;
  footer: string;
  /** Short badge text in the header (e.g. initials) */
  badge?: string;
  brandColorStart?: string;
  brandColorEnd?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/** Escape user-supplied text before it goes into bodyHtml */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Render branded email HTML. No nodemailer dependency. */
export function renderEmailHtml({
  heading,
  bodyHtml,
  footer,
  badge = "✉",
  brandColorStart = EMAIL_BRAND_DEFAULTS.brandColorStart,
  brandColorEnd = EMAIL_BRAND_DEFAULTS.brandColorEnd,
}: RenderEmailOptions): string {
  const gradient = `linear-gradient(135deg, ${brandColorStart} 0%, ${brandColorEnd} 100%)`;
  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><meta name="viewport" content="width=device-width, initial-scale=1.0"></head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px; background: #f5f5f5;">
  <div style="background: ${gradient}; padding: 32px; border-radius: 12px 12px 0 0; text-align: center;">
    <div style="display: inline-block; width: 56px; height: 56px; background: white; border-radius: 14px; line-height: 56px; font-size: 24px; font-weight: bold; color: ${brandColorStart};">${escapeHtml(badge)}</div>
    <h1 style="color: white; margin: 16px 0 0; font-size: 22px; font-weight: 600;">${escapeHtml(heading)}</h1>
  </div>
  <div style="background: white; padding: 32px; border-radius: 0 0 12px 12px; box-shadow: 0 2px 8px rgba(0,0,0,0.08);">
    <div style="font-size: 16px; margin: 0 0 32px;">${bodyHtml}</div>
    <hr style="border: none; border-top: 1px solid #eee; margin: 24px 0;">
    <p style="font-size: 13px; color: #999; margin: 0;">${escapeHtml(footer)}</p>
  </div>
</body>
</html>`;
}
