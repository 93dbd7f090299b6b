import { Logger } from '@nestjs/common';
import Handlebars from 'handlebars';
import { readFile, realpath, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  ContextTooLargeError,
  PathTraversalError,
  TemplateNotFoundError,
  errToMessage,
} from './newsletter.errors';
import { auditHtml, type AuditReport } from './render-audit';
import { deepSanitize, sanitizePath, type SanitizedContext } from './sanitizer';

export const DEFAULT_MAX_CONTEXT_BYTES = 2 * 1024 * 1024;

export type RenderPhase =
  | 'idle'
  | 'templateResolved'
  | 'contextSanitized'
  | 'rendered'
  | 'audited'
  | 'done'
  | 'failed';

export type RenderOutcome = {
  html: string;
  /** `done` when the rendered template passed the audit, `failed` when the fallback was used. */
  phase: RenderPhase;
  audit: AuditReport;
  fallback: boolean;
  error?: string;
};

export type SecureRendererOptions = {
  templateRoot: string;
  maxContextBytes?: number;
};

export const FALLBACK_HTML = [
  '<!DOCTYPE html>',
  '<html lang="en">',
  '<head><meta charset="utf-8"><title>Newsletter unavailable</title></head>',
  '<body style="font-family: sans-serif; color: #333;">',
  '<p>This newsletter could not be rendered safely. Please check the server logs.</p>',
  '</body>',
  '</html>',
].join('\n');

type CompiledTemplate = {
  mtimeMs: number;
  render: Handlebars.TemplateDelegate<SanitizedContext>;
};

function isNotFound(err: unknown): boolean {
  // fs errors come from another realm under Jest, so `instanceof Error` cannot be relied on.
  const code = (err as NodeJS.ErrnoException | undefined)?.code;
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Renders a Handlebars template from a fixed root against a sanitized context, then
 * audits the output. Only path, missing-template and size errors propagate; everything
 * else yields the static fallback document.
 */
export class SecureRenderer {
  private readonly logger = new Logger(SecureRenderer.name);
  private readonly handlebars = Handlebars.create();
  private readonly compiled = new Map<string, CompiledTemplate>();
  private readonly templateRoot: string;
  private readonly maxContextBytes: number;

  constructor(options: SecureRendererOptions) {
    this.templateRoot = resolve(options.templateRoot);
    this.maxContextBytes = options.maxContextBytes ?? DEFAULT_MAX_CONTEXT_BYTES;
  }

  async render(templateName: string, context: Record<string, unknown>): Promise<RenderOutcome> {
    let phase: RenderPhase = 'idle';
    const advance = (next: RenderPhase) => {
      this.logger.debug(`${templateName}: ${phase} -> ${next}`);
      phase = next;
    };

    let template: CompiledTemplate;
    try {
      template = await this.resolveTemplate(templateName);
      advance('templateResolved');
    } catch (err) {
      advance('failed');
      throw err;
    }

    const sanitized = deepSanitize(context);
    const bytes = Buffer.byteLength(JSON.stringify(sanitized), 'utf8');
    if (bytes > this.maxContextBytes) {
      advance('failed');
      throw new ContextTooLargeError(bytes, this.maxContextBytes);
    }
    advance('contextSanitized');

    let html: string;
    try {
      html = template.render(sanitized);
      advance('rendered');
    } catch (err) {
      const error = errToMessage(err);
      this.logger.error(`Template ${templateName} failed to render: ${error}`);
      advance('failed');
      return {
        html: FALLBACK_HTML,
        phase,
        audit: { passed: false, findings: [] },
        fallback: true,
        error,
      };
    }

    const audit = auditHtml(html);
    advance('audited');
    if (!audit.passed) {
      this.logger.error(
        `Rendered ${templateName} failed the safety audit (${audit.findings.length} finding(s)): ${audit.findings
          .map((f) => `${f.rule} ${JSON.stringify(f.excerpt)}`)
          .join('; ')}`,
      );
      advance('failed');
      return { html: FALLBACK_HTML, phase, audit, fallback: true };
    }

    advance('done');
    return { html, phase, audit, fallback: false };
  }

  private async resolveTemplate(templateName: string): Promise<CompiledTemplate> {
    const candidate = sanitizePath(templateName, this.templateRoot);

    let realRoot: string;
    let realPath: string;
    try {
      realRoot = await realpath(this.templateRoot);
      realPath = await realpath(candidate);
    } catch (err) {
      if (isNotFound(err)) throw new TemplateNotFoundError(templateName);
      throw err;
    }

    // A symlink inside the root may still point outside it.
    try {
      sanitizePath(realPath, realRoot);
    } catch {
      throw new PathTraversalError(templateName);
    }

    const info = await stat(realPath);
    if (!info.isFile()) throw new TemplateNotFoundError(templateName);

    const cached = this.compiled.get(realPath);
    if (cached && cached.mtimeMs === info.mtimeMs) return cached;

    const source = await readFile(realPath, 'utf8');
    const compiled: CompiledTemplate = {
      mtimeMs: info.mtimeMs,
      render: this.handlebars.compile<SanitizedContext>(source, {
        knownHelpersOnly: true,
        strict: false,
      }),
    };
    this.compiled.set(realPath, compiled);
    return compiled;
  }
}
