import { Lexer, type Token, type Tokens } from "marked";

/**
 * Converts GitHub-flavored markdown to the HTML subset Matrix clients render in formatted_body.
 *
 * Expects: markdown string.
 * Returns: escaped HTML without a trailing newline.
 */
export function markdownToMatrixHtml(markdown: string): string {
    const lexer = new Lexer({ gfm: true, breaks: true });
    const tokens = lexer.lex(markdown);
    return renderTokens(tokens).trim();
}

function escapeHtml(text: string): string {
    return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

function renderTokens(tokens: Token[]): string {
    return tokens.map(renderToken).join("");
}

function renderToken(token: Token): string {
    switch (token.type) {
        case "paragraph":
            return `<p>${renderInline(token as Tokens.Paragraph)}</p>\n`;

        case "text":
            if ("tokens" in token && token.tokens) {
                return renderInline(token);
            }
            return escapeHtml((token as Tokens.Text).text);

        case "heading": {
            const heading = token as Tokens.Heading;
            const depth = Math.min(Math.max(heading.depth, 1), 6);
            return `<h${depth}>${renderInline(heading)}</h${depth}>\n`;
        }

        case "code":
            return renderCodeBlock(token as Tokens.Code);

        case "blockquote":
            return `<blockquote>${renderTokens((token as Tokens.Blockquote).tokens).trim()}</blockquote>\n`;

        case "list":
            return renderList(token as Tokens.List);

        case "space":
            return "";

        case "hr":
            return "<hr>\n";

        // Raw HTML is shown as text.
        case "html":
            return escapeHtml((token as Tokens.HTML).text);

        case "table":
            return renderTable(token as Tokens.Table);

        default:
            if ("tokens" in token && token.tokens) {
                return renderTokens(token.tokens);
            }
            if ("text" in token && typeof token.text === "string") {
                return escapeHtml(token.text);
            }
            return "";
    }
}

function renderInline(token: { tokens?: Token[]; text?: string }): string {
    if (token.tokens) {
        return token.tokens.map(renderInlineToken).join("");
    }
    return escapeHtml(token.text ?? "");
}

function renderInlineToken(token: Token): string {
    switch (token.type) {
        case "text":
            if ("tokens" in token && token.tokens) {
                return renderInline(token);
            }
            return escapeHtml((token as Tokens.Text).text);

        case "strong":
            return `<strong>${renderInline(token as Tokens.Strong)}</strong>`;

        case "em":
            return `<em>${renderInline(token as Tokens.Em)}</em>`;

        case "del":
            return `<del>${renderInline(token as Tokens.Del)}</del>`;

        case "codespan":
            return `<code>${escapeHtml((token as Tokens.Codespan).text)}</code>`;

        case "link": {
            const link = token as Tokens.Link;
            return `<a href="${escapeHtml(link.href)}">${renderInline(link)}</a>`;
        }

        case "image": {
            const image = token as Tokens.Image;
            return `<a href="${escapeHtml(image.href)}">${escapeHtml(image.text)}</a>`;
        }

        case "br":
            return "<br>";

        case "escape":
            return escapeHtml((token as Tokens.Escape).text);

        case "html":
            return escapeHtml((token as Tokens.HTML).text);

        default:
            if ("tokens" in token && token.tokens) {
                return renderInline(token);
            }
            if ("text" in token && typeof token.text === "string") {
                return escapeHtml(token.text);
            }
            return "";
    }
}

function renderCodeBlock(token: Tokens.Code): string {
    const escaped = escapeHtml(token.text);
    const lang = token.lang?.trim().split(/\s+/)[0];
    if (lang) {
        return `<pre><code class="language-${escapeHtml(lang)}">${escaped}</code></pre>\n`;
    }
    return `<pre><code>${escaped}</code></pre>\n`;
}

function renderList(token: Tokens.List): string {
    const tag = token.ordered ? "ol" : "ul";
    const start = token.ordered && typeof token.start === "number" && token.start !== 1 ? ` start="${token.start}"` : "";
    const items = token.items.map((item) => `<li>${renderListItem(item)}</li>`).join("");
    return `<${tag}${start}>${items}</${tag}>\n`;
}

function renderListItem(item: Tokens.ListItem): string {
    const checkbox = item.checked === true ? "☑ " : item.checked === false ? "☐ " : "";
    const content = item.tokens
        .map((child) => {
            if (child.type === "text" && "tokens" in child && child.tokens) {
                return child.tokens.map(renderInlineToken).join("");
            }
            if (child.type === "paragraph") {
                return renderInline(child);
            }
            return renderToken(child);
        })
        .join("")
        .trim();
    return checkbox + content;
}

function renderTable(token: Tokens.Table): string {
    const header = token.header.map((cell) => `<th>${renderInline(cell)}</th>`).join("");
    const rows = token.rows.map((row) => `<tr>${row.map((cell) => `<td>${renderInline(cell)}</td>`).join("")}</tr>`).join("");
    return `<table><thead><tr>${header}</tr></thead><tbody>${rows}</tbody></table>\n`;
}
