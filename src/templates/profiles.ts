/**
 * Style profiles
 * Font sizing per output target; each profile supports a subset of formats
 */

import type { OutputFormat, StyleProfileName } from "../types";

export interface StyleProfile {
  name: string;
  description: string;
  fontScale: number;
  baseFontSize: string;
  formats: OutputFormat[];
  stripTableOfContents: boolean;
}

export const STYLE_PROFILE_DEFINITIONS: Record<StyleProfileName, StyleProfile> = {
  "a4-print": {
    name: "A4 Print (Default)",
    description: "Standard print-optimized styling with 12px base font",
    fontScale: 1.0,
    baseFontSize: "12px",
    formats: ["pdf"],
    stripTableOfContents: true,
  },
  "a4-screen": {
    name: "A4 Screen (Large)",
    description: "Screen-optimized styling with 30% larger fonts",
    fontScale: 1.3,
    baseFontSize: "15.6px",
    formats: ["pdf"],
    stripTableOfContents: false,
  },
  "kindle-basic": {
    name: "Kindle Basic",
    description: "Basic Kindle formatting for e-ink displays",
    fontScale: 1.0,
    baseFontSize: "12px",
    formats: ["epub", "mobi"],
    stripTableOfContents: false,
  },
  "kindle-large": {
    name: "Kindle Large Text",
    description: "Large text for Kindle devices",
    fontScale: 1.2,
    baseFontSize: "14px",
    formats: ["epub", "mobi"],
    stripTableOfContents: false,
  },
  "kindle-paperwhite-11": {
    name: "Kindle Paperwhite 11th Gen",
    description: "Tuned for the 6.8\" 300ppi Paperwhite display",
    fontScale: 1.1,
    baseFontSize: "13px",
    formats: ["epub", "mobi"],
    stripTableOfContents: false,
  },
};

export const DEFAULT_PROFILE: Record<OutputFormat, StyleProfileName> = {
  pdf: "a4-print",
  epub: "kindle-basic",
  mobi: "kindle-basic",
};

export function getProfile(name: StyleProfileName): StyleProfile {
  return STYLE_PROFILE_DEFINITIONS[name];
}
