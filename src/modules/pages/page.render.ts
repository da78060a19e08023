import { html, type SafeHtml } from "./html";

export type IndexPageOptions = {
  title: string;
  csrfToken: string;
  scripts: readonly string[];
  /** Base path the client resolves partial templates against. */
  templatesPath: string;
  /**
   * Angular module to bootstrap through `ng-app`. Left off unless one of
   * the scripts registers it; otherwise bootstrap fails on load.
   */
  appModule?: string;
};

export function renderIndexPage(options: IndexPageOptions): string {
  const scripts: SafeHtml[] = options.scripts.map(
    (src) => html`    <script src="${src}"></script>\n`,
  );
  const appAttribute = options.appModule
    ? html` ng-app="${options.appModule}"`
    : "";

  return html`<!DOCTYPE html>
<html lang="en"${appAttribute}>
  <head>
    <meta charset="utf-8">
    <title>${options.title}</title>
    <meta name="csrf-param" content="authenticity_token">
    <meta name="csrf-token" content="${options.csrfToken}">
    <meta name="templates-path" content="${options.templatesPath}">
${scripts}  </head>
  <body>
    <main ng-view></main>
  </body>
</html>
`.toString();
}
