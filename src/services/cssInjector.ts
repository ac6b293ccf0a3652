/**
 * Embed custom CSS into an HTML string as a <style> block.
 *
 * Plain substring search, not a parse: the first `</head>` wins even when it
 * sits inside a comment or script, then the first `<body>`, otherwise the
 * input is treated as a fragment and wrapped in a full document.
 */
export function injectCss(html: string, css?: string | null): string {
  if (!css) {
    return html;
  }

  const styleTag = `<style>${css}</style>`;

  const headClose = html.indexOf('</head>');
  if (headClose !== -1) {
    return html.slice(0, headClose) + styleTag + html.slice(headClose);
  }

  const bodyOpen = html.indexOf('<body>');
  if (bodyOpen !== -1) {
    return html.slice(0, bodyOpen) + `<head>${styleTag}</head>` + html.slice(bodyOpen);
  }

  return `<html><head>${styleTag}</head><body>${html}</body></html>`;
}
