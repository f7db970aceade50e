import { config } from "../config.js";

const siteTitle = config.wikiTitle;

export const escapeHtml = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");

export const formatDate = (value: string): string => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return "-";

  return new Intl.DateTimeFormat("en-GB", {
    dateStyle: "medium",
    timeStyle: "medium"
  }).format(date);
};

export const wikiPath = (name: string): string => `/wiki/${encodeURIComponent(name)}`;

interface LayoutOptions {
  title: string;
  body: string;
  error?: string | undefined;
}

export const renderLayout = (options: LayoutOptions): string => {
  const resolvedTitle = options.title.trim();
  const title = resolvedTitle.length > 0 ? `${escapeHtml(resolvedTitle)} | ${escapeHtml(siteTitle)}` : escapeHtml(siteTitle);
  const flash = options.error ? `<div class="flash error">${escapeHtml(options.error)}</div>` : "";

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <meta name="referrer" content="same-origin" />
    <title>${title}</title>
    <link rel="stylesheet" href="/css/wiki.css" />
  </head>
  <body>
    <header class="site-header">
      <a href="/" class="brand">${escapeHtml(siteTitle)}</a>
    </header>

    <main class="container" id="main-content">
      ${flash}
      ${options.body}
    </main>
  </body>
</html>`;
};
