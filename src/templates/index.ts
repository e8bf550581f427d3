/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import {
  DEFAULT_DOCUMENT_TEMPLATE,
  DEFAULT_STYLESHEET_TEMPLATE,
  MERMAID_PAGE_TEMPLATE,
  PAPERWHITE_STYLESHEET,
} from "./defaults";
import { getProfile } from "./profiles";
import { formatCm, parseMargins } from "../utils/margins";
import type { ConversionSettings } from "../types";

export {
  PDF_FOOTER_TEMPLATE,
  PDF_HEADER_TEMPLATE,
} from "./defaults";
export { getProfile, DEFAULT_PROFILE, STYLE_PROFILE_DEFINITIONS } from "./profiles";
export type { StyleProfile } from "./profiles";

// Font size relative to the profile scale, one decimal
// Usage: {{em 1.6 fontScale}}
Handlebars.registerHelper("em", (base: unknown, scale: unknown) => {
  return (Number(base) * Number(scale)).toFixed(1);
});

export type TemplateDelegate = HandlebarsTemplateDelegate;

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<TemplateDelegate> {
  if (templatePath === null) {
    return Handlebars.compile(defaultTemplate);
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile(templateContent);
}

export interface DocumentTemplates {
  document: TemplateDelegate;
  stylesheet: TemplateDelegate;
}

export async function loadDocumentTemplates(
  settings: ConversionSettings,
): Promise<DocumentTemplates> {
  const [document, stylesheet] = await Promise.all([
    loadTemplate(settings.templates.document, DEFAULT_DOCUMENT_TEMPLATE),
    loadTemplate(settings.templates.stylesheet, DEFAULT_STYLESHEET_TEMPLATE),
  ]);
  return { document, stylesheet };
}

/**
 * Stylesheet for the configured profile; @page margins only for PDF
 */
export function renderStylesheet(
  template: TemplateDelegate,
  settings: ConversionSettings,
): string {
  const profile = getProfile(settings.profile);
  const paged = settings.format === "pdf";
  const margins = parseMargins(settings.margins);

  const css = template({
    paged,
    margins: {
      top: formatCm(margins.top),
      right: formatCm(margins.right),
      bottom: formatCm(margins.bottom),
      left: formatCm(margins.left),
    },
    baseFontSize: profile.baseFontSize,
    fontScale: profile.fontScale,
  });

  return settings.profile === "kindle-paperwhite-11"
    ? `${css}\n${PAPERWHITE_STYLESHEET}`
    : css;
}

export interface DocumentTemplateContext {
  title: string;
  language: string;
  stylesheet: string;
  content: string;
}

export function renderDocument(
  template: TemplateDelegate,
  context: DocumentTemplateContext,
): string {
  return template(context);
}

const mermaidPage = Handlebars.compile(MERMAID_PAGE_TEMPLATE);

/**
 * Diagram source is HTML-escaped; Mermaid decodes entities before parsing
 */
export function renderMermaidPage(source: string, scriptUrl: string): string {
  return mermaidPage({ source, scriptUrl });
}
