import { describe, expect, it } from "vitest";

import { markdownToMatrixHtml } from "./markdownToMatrixHtml.js";

describe("markdownToMatrixHtml", () => {
    it("renders emphasis", () => {
        expect(markdownToMatrixHtml("**Hello** _world_")).toBe("<p><strong>Hello</strong> <em>world</em></p>");
    });

    it("renders headings and lists", () => {
        expect(markdownToMatrixHtml("# Title\n\n- one\n- two")).toBe("<h1>Title</h1>\n<ul><li>one</li><li>two</li></ul>");
    });

    it("escapes code blocks and keeps the language", () => {
        expect(markdownToMatrixHtml("```ts\nconst a = 1 < 2;\n```")).toBe(
            '<pre><code class="language-ts">const a = 1 &lt; 2;</code></pre>'
        );
    });

    it("escapes inline code and text", () => {
        expect(markdownToMatrixHtml("`<b>`")).toBe("<p><code>&lt;b&gt;</code></p>");
        expect(markdownToMatrixHtml("Tom & Jerry")).toBe("<p>Tom &amp; Jerry</p>");
    });

    it("turns single newlines into line breaks", () => {
        expect(markdownToMatrixHtml("line one\nline two")).toBe("<p>line one<br>line two</p>");
    });

    it("renders links and tables", () => {
        expect(markdownToMatrixHtml("[docs](https://example.org)")).toBe('<p><a href="https://example.org">docs</a></p>');
        expect(markdownToMatrixHtml("| A | B |\n|---|---|\n| 1 | 2 |")).toBe(
            "<table><thead><tr><th>A</th><th>B</th></tr></thead><tbody><tr><td>1</td><td>2</td></tr></tbody></table>"
        );
    });
});
