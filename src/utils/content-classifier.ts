/**
 * Content Classifier
 *
 * Picks the text-family type for captured clipboard text. Checks run in a
 * fixed order and the first match wins: email, mailto link, URL, phone
 * number, JSON, color, code, and plain text as the fallback.
 */

import type { TextItemType } from "../models/clipboard-item";

const EMAIL_PATTERN = /^[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}$/i;
const PHONE_PATTERN = /^[+]?[(]?[0-9]{1,4}[)]?[-\s./0-9]{6,}$/;
const HEX_COLOR_PATTERN = /^#([0-9a-fA-F]{3}){1,2}$/;
const FUNCTIONAL_COLOR_PATTERN = /^(rgb|rgba|hsl|hsla)\(/i;
const CONTROL_FLOW_PATTERN = /^\s*(if|for|while)\s*\(/;
const HIERARCHICAL_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

const parseUrl = (input: string): URL | undefined => {
  if (/\s/.test(input)) return undefined;
  try {
    return new URL(input);
  } catch {
    return undefined;
  }
};

const isMailTo = (input: string): boolean => parseUrl(input)?.protocol === "mailto:";

const isUrl = (input: string): boolean => {
  const url = parseUrl(input);
  return url !== undefined && url.protocol !== "mailto:" && HIERARCHICAL_SCHEME_PATTERN.test(input);
};

const isJson = (input: string): boolean => {
  if (input.length < 2) return false;
  const first = input[0];
  const last = input[input.length - 1];
  const candidate = (first === "{" && last === "}") || (first === "[" && last === "]");
  if (!candidate) return false;

  try {
    JSON.parse(input);
    return true;
  } catch {
    return false;
  }
};

const isColor = (input: string): boolean =>
  HEX_COLOR_PATTERN.test(input) || FUNCTIONAL_COLOR_PATTERN.test(input);

/**
 * Code needs at least two independent indicators
 */
const looksLikeCode = (input: string): boolean => {
  const has = (...needles: string[]) => needles.some((needle) => input.includes(needle));

  const indicators = [
    has("func ", "function "),
    has("class ", "struct "),
    has("import ", "package "),
    has("const ", "let ", "var "),
    has("def ", "=>"),
    input.split("\n").length > 3 && has("{", ":"),
    has("public ", "private "),
    CONTROL_FLOW_PATTERN.test(input),
  ];

  return indicators.filter(Boolean).length >= 2;
};

export const classifyText = (text: string): TextItemType => {
  const trimmed = text.trim();
  if (trimmed.length === 0) return "Text";

  if (EMAIL_PATTERN.test(trimmed) || isMailTo(trimmed)) return "Email";
  if (isUrl(trimmed)) return "Url";
  if (PHONE_PATTERN.test(trimmed)) return "Phone";
  if (isJson(trimmed)) return "Json";
  if (isColor(trimmed)) return "Color";
  if (looksLikeCode(trimmed)) return "Code";
  return "Text";
};
