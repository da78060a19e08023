import { describe, it, expect } from "vitest";
import { escapeHtml, html } from "@/modules/pages/html";
import { renderIndexPage } from "@/modules/pages/page.render";

describe("html", () => {
  it("escapes interpolated values but not nested fragments", () => {
    const inner = html`<b>${"<i>"}</b>`;
    expect(html`<p title="${`"x" & 'y'`}">${inner}</p>`.toString()).toBe(
      `<p title="&quot;x&quot; &amp; &#39;y&#39;"><b>&lt;i&gt;</b></p>`,
    );
  });

  it("renders null and undefined as empty", () => {
    expect(escapeHtml(null)).toBe("");
    expect(escapeHtml(undefined)).toBe("");
    expect(escapeHtml(42)).toBe("42");
  });
});

describe("renderIndexPage", () => {
  it("renders the shell with the token and scripts in order", () => {
    const page = renderIndexPage({
      title: "Programmers",
      csrfToken: "test-token",
      scripts: ["/vendor/angular.js", "/app.js?v=1&x=2"],
      templatesPath: "/templates",
    });

    expect(page).toBe(`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>Programmers</title>
    <meta name="csrf-param" content="authenticity_token">
    <meta name="csrf-token" content="test-token">
    <meta name="templates-path" content="/templates">
    <script src="/vendor/angular.js"></script>
    <script src="/app.js?v=1&amp;x=2"></script>
  </head>
  <body>
    <main ng-view></main>
  </body>
</html>
`);
  });

  it("bootstraps the configured app module", () => {
    const page = renderIndexPage({
      title: "Programmers",
      csrfToken: "test-token",
      scripts: ["/vendor/angular.js", "/app.js"],
      templatesPath: "/templates",
      appModule: "programmers",
    });

    expect(page.split("\n")[1]).toBe('<html lang="en" ng-app="programmers">');
  });

  it("escapes the title", () => {
    const page = renderIndexPage({
      title: "<Programmers>",
      csrfToken: "t",
      scripts: [],
      templatesPath: "/templates",
    });

    expect(page).toContain("<title>&lt;Programmers&gt;</title>");
    expect(page).toContain(
      '<meta name="templates-path" content="/templates">\n  </head>',
    );
  });
});
