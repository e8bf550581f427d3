/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

/**
 * Full HTML document wrapping the converted body
 */
export const DEFAULT_DOCUMENT_TEMPLATE = `<!DOCTYPE html>
<html lang="{{language}}">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>{{title}}</title>
  <style>
{{{stylesheet}}}
  </style>
</head>
<body>
{{{content}}}
</body>
</html>
`;

/**
 * Base stylesheet, sized by the style profile
 * Context: { paged, margins, baseFontSize, fontScale }
 */
export const DEFAULT_STYLESHEET_TEMPLATE = `{{#if paged}}
@page {
  margin: {{margins.top}} {{margins.right}} {{margins.bottom}} {{margins.left}};
  size: A4 portrait;
}
{{/if}}
* {
  box-sizing: border-box;
}

body {
  font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif;
  font-size: {{baseFontSize}};
  line-height: 1.4;
  color: #333;
  margin: 0;
  padding: 0;
  width: 100%;
}

h1, h2, h3, h4, h5, h6 {
  color: #2c3e50;
  margin-top: 0.8em;
  margin-bottom: 0.3em;
  font-weight: 600;
  page-break-inside: avoid;
  break-inside: avoid;
}

h1 { font-size: {{em 1.6 fontScale}}em; border-bottom: 2px solid #3498db; padding-bottom: 0.2em; }
h2 { font-size: {{em 1.3 fontScale}}em; border-bottom: 1px solid #bdc3c7; padding-bottom: 0.1em; }
h3 { font-size: {{em 1.1 fontScale}}em; }
h4 { font-size: {{em 1.0 fontScale}}em; text-decoration: underline; }
h5 { font-size: {{em 0.9 fontScale}}em; text-decoration: underline; }
h6 { font-size: {{em 0.8 fontScale}}em; text-decoration: underline; }

h1, h2, h3 {
  page-break-after: avoid;
  break-after: avoid;
}

p {
  margin: 0.5em 0;
  text-align: justify;
}

p, li {
  orphans: 3;
  widows: 3;
}

code {
  background-color: #f8f9fa;
  border: 1px solid #e9ecef;
  border-radius: 3px;
  padding: 0.1em 0.3em;
  font-family: "Courier New", Consolas, monospace;
  font-size: {{em 0.8 fontScale}}em;
  color: #e83e8c;
}

pre {
  background-color: #f8f9fa;
  border: 1px solid #e9ecef;
  border-radius: 5px;
  padding: 0.5em;
  overflow-x: auto;
  margin: 0.5em 0;
  font-size: {{em 0.8 fontScale}}em;
}

pre code {
  background: none;
  border: none;
  padding: 0;
  color: #333;
}

blockquote {
  border-left: 4px solid #3498db;
  margin: 0.5em 0;
  padding: 0.3em 0.8em;
  background-color: #f8f9fa;
  color: #555;
}

table {
  border-collapse: collapse;
  width: 100%;
  max-width: 100%;
  margin: 0.5em 0;
}

table, table th, table td {
  font-size: {{baseFontSize}};
  font-family: inherit;
}

th, td {
  border: 1px solid #ddd;
  padding: 0.3em;
  text-align: left;
}

th {
  background-color: #f8f9fa;
  font-weight: 600;
}

ul, ol {
  margin: 0.5em 0;
  padding-left: 1.5em;
}

ul ul, ol ol, ul ol, ol ul {
  margin: 0.2em 0;
  padding-left: 1.2em;
}

img {
  max-width: 100%;
  height: auto;
  display: block;
  margin: 0.5em auto;
}

a {
  color: #3498db;
  text-decoration: none;
}

pre, blockquote, table, img {
  page-break-inside: avoid;
  break-inside: avoid;
}

.page-break {
  page-break-before: always;
}
`;

/**
 * Extra rules for the Kindle Paperwhite 11th generation profile
 * (6.8" E Ink Carta, 1648 x 1236, 300 ppi)
 */
export const PAPERWHITE_STYLESHEET = `
body {
  font-family: "Bookerly", "Caecilia", "Helvetica", "Arial", sans-serif;
  line-height: 1.6;
  color: #000000;
  padding: 0.8em;
  hyphens: auto;
  -webkit-hyphens: auto;
}

h1, h2, h3, h4, h5, h6 {
  color: #000000;
  border: none;
  page-break-after: avoid;
}

pre, code {
  background-color: #f5f5f5;
  border-color: #ddd;
  color: #000000;
  font-size: 11px;
}

th {
  background-color: #f8f8f8;
  font-weight: bold;
}

img {
  margin: 1em auto;
}
`;

/**
 * Minimal page that renders one Mermaid diagram.
 * Render errors are recorded on window.__diagramError for the probe script.
 */
export const MERMAID_PAGE_TEMPLATE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <script src="{{scriptUrl}}"></script>
  <style>
    body { margin: 0; padding: 10px; background: white; font-family: Arial, sans-serif; }
    .mermaid { text-align: center; background: white; display: inline-block; padding: 5px; }
    .mermaid svg { max-width: none; height: auto; display: block; font-family: Arial, sans-serif; }
  </style>
</head>
<body>
  <pre class="mermaid">{{source}}</pre>
  <script>
    if (typeof mermaid === "undefined") {
      window.__diagramError = "Mermaid script failed to load";
    } else {
      mermaid.initialize({
        startOnLoad: false,
        theme: "default",
        flowchart: { useMaxWidth: false, htmlLabels: true, curve: "basis", nodeSpacing: 30, rankSpacing: 30 },
        sequence: { useMaxWidth: false, messageFontSize: 12, actorFontSize: 12 },
        gantt: { useMaxWidth: false }
      });
      mermaid.run({ querySelector: ".mermaid" }).catch(function (error) {
        window.__diagramError = (error && error.message) || String(error);
      });
    }
  </script>
</body>
</html>
`;

/** Page-number footer for PDF output */
export const PDF_FOOTER_TEMPLATE =
  '<div style="font-size: 10px; text-align: center; width: 100%; margin: 0 auto;"><span class="pageNumber"></span></div>';

export const PDF_HEADER_TEMPLATE = "<div></div>";
