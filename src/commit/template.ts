/**
 * Commit message templates.
 *
 * Placeholder vocabulary is fixed: {op} {path} {summary} {reason}.
 * {op}, {path} and {summary} must appear in the subject and must have
 * non-empty values; {reason} defaults to "". `{{` and `}}` are literal
 * braces.
 *
 * Pure module. Validation reports every problem at once and runs before
 * the pipeline touches the working tree.
 */

import { CommitFsError } from "../core/errors.js";
import type { CommitTemplate } from "../core/schemas.js";

export const PLACEHOLDERS = ["op", "path", "summary", "reason"] as const;
export type Placeholder = (typeof PLACEHOLDERS)[number];

export const REQUIRED_PLACEHOLDERS: readonly Placeholder[] = [
  "op",
  "path",
  "summary",
];

export const DEFAULT_TEMPLATE: CommitTemplate = {
  subject: "[{op}] {path} – {summary}",
  body: "{reason}",
};

export interface TemplateValues {
  op: string;
  path: string;
  summary: string;
  reason?: string;
}

export interface RenderedMessage {
  subject: string;
  body: string;
}

export interface TemplateLint {
  ok: boolean;
  /** Placeholders outside the vocabulary. */
  unknown: string[];
  /** Required placeholders absent from the subject or lacking a value. */
  missing: Placeholder[];
  problems: string[];
}

// ---------------------------------------------------------------------------
// Scanning
// ---------------------------------------------------------------------------

type Part = { literal: string } | { name: string };

function isPlaceholder(name: string): name is Placeholder {
  return (PLACEHOLDERS as readonly string[]).includes(name);
}

function scan(text: string, field: string): { parts: Part[]; problems: string[] } {
  const parts: Part[] = [];
  const problems: string[] = [];
  let literal = "";
  let i = 0;

  while (i < text.length) {
    const ch = text[i]!;
    const next = text[i + 1];
    if (ch === "{" && next === "{") {
      literal += "{";
      i += 2;
    } else if (ch === "}" && next === "}") {
      literal += "}";
      i += 2;
    } else if (ch === "{") {
      const close = text.indexOf("}", i + 1);
      const nested = text.indexOf("{", i + 1);
      if (close === -1 || (nested !== -1 && nested < close)) {
        problems.push(`unbalanced "{" in ${field} at offset ${i}`);
        literal += ch;
        i += 1;
        continue;
      }
      if (literal) parts.push({ literal });
      literal = "";
      parts.push({ name: text.slice(i + 1, close).trim() });
      i = close + 1;
    } else if (ch === "}") {
      problems.push(`unbalanced "}" in ${field} at offset ${i}`);
      literal += ch;
      i += 1;
    } else {
      literal += ch;
      i += 1;
    }
  }
  if (literal) parts.push({ literal });
  return { parts, problems };
}

function names(parts: Part[]): string[] {
  return parts.flatMap((p) => ("name" in p ? [p.name] : []));
}

function substitute(parts: Part[], values: TemplateValues): string {
  return parts
    .map((p) => {
      if ("literal" in p) return p.literal;
      return isPlaceholder(p.name) ? (values[p.name] ?? "") : "";
    })
    .join("");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function lintTemplate(
  template: CommitTemplate,
  values: TemplateValues,
): TemplateLint {
  const subject = scan(template.subject, "subject");
  const body = scan(template.body ?? "", "body");
  const problems = [...subject.problems, ...body.problems];

  const unknown: string[] = [];
  for (const name of [...names(subject.parts), ...names(body.parts)]) {
    if (!isPlaceholder(name) && !unknown.includes(name)) {
      unknown.push(name);
      problems.push(`unknown placeholder {${name}}`);
    }
  }

  const missing: Placeholder[] = [];
  const subjectNames = names(subject.parts);
  for (const name of REQUIRED_PLACEHOLDERS) {
    if (!subjectNames.includes(name)) {
      missing.push(name);
      problems.push(`required placeholder {${name}} missing from subject`);
    } else if ((values[name] ?? "").trim().length === 0) {
      missing.push(name);
      problems.push(`required value for {${name}} is empty`);
    }
  }

  if (problems.length === 0) {
    const rendered = substitute(subject.parts, values);
    if (/[\r\n]/.test(rendered)) {
      problems.push("subject must render to a single line");
    }
    if (
      template.maxSubjectLength !== undefined &&
      rendered.length > template.maxSubjectLength
    ) {
      problems.push(
        `subject is ${rendered.length} characters, limit is ${template.maxSubjectLength}`,
      );
    }
  }

  return { ok: problems.length === 0, unknown, missing, problems };
}

/**
 * Validate and render.
 *
 * @throws CommitFsError TEMPLATE_INVALID listing every problem
 */
export function renderTemplate(
  template: CommitTemplate,
  values: TemplateValues,
): RenderedMessage {
  const lint = lintTemplate(template, values);
  if (!lint.ok) {
    throw new CommitFsError(
      `Commit template invalid: ${lint.problems.join("; ")}`,
      "TEMPLATE_INVALID",
      { unknown: lint.unknown, missing: lint.missing, problems: lint.problems },
    );
  }
  const withReason: TemplateValues = { ...values, reason: values.reason ?? "" };
  return {
    subject: substitute(scan(template.subject, "subject").parts, withReason).trim(),
    body: substitute(scan(template.body ?? "", "body").parts, withReason).trim(),
  };
}

/** Full commit message text as passed to git. */
export function formatMessage(message: RenderedMessage): string {
  return message.body ? `${message.subject}\n\n${message.body}` : message.subject;
}
