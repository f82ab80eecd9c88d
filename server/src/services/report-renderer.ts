/**
 * Report Renderer
 *
 * Projects a Meeting into a standalone HTML document. Output depends only
 * on the Meeting and the template, so rendering the same snapshot twice
 * produces identical bytes.
 */

import fs from 'fs';
import path from 'path';
import { RenderError } from '../errors.js';
import { escapeHtml } from '../utils/html-entities.js';
import { displayAuthor, getMeetingState, listUpdates } from '../meetings/meeting.js';
import type { Meeting, Update } from '../types.js';

export const REPORT_TEMPLATE_FILENAME = 'meeting-report.html';
export const NO_UPDATES_MESSAGE = 'No updates submitted';

const PLACEHOLDER_PATTERN = /\{\{\s*([a-z_]+)\s*\}\}/g;

export interface ReportRendererOptions {
  /** Directory containing meeting-report.html */
  templatesDir?: string;
  /** Template source; takes precedence over templatesDir */
  template?: string;
}

export class ReportRenderer {
  private readonly templatesDir: string | null;
  private template: string | null;

  constructor(options: ReportRendererOptions) {
    this.templatesDir = options.templatesDir ?? null;
    this.template = options.template ?? null;
  }

  /**
   * Render the meeting report.
   * Throws RenderError('missing_template') when the template cannot be read
   * and RenderError('data_binding') when the meeting cannot be bound to it.
   */
  render(meeting: Meeting): string {
    const template = this.loadTemplate();

    let bindings: Record<string, string>;
    try {
      bindings = {
        page_title: escapeHtml(reportTitle(meeting)),
        meeting_id: escapeHtml(meeting.id),
        header: renderHeader(meeting),
        updates: renderUpdates(listUpdates(meeting)),
      };
    } catch (error) {
      throw new RenderError(
        'data_binding',
        `Failed to bind meeting ${meeting.id}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    return bindTemplate(template, bindings);
  }

  private loadTemplate(): string {
    if (this.template !== null) {
      return this.template;
    }

    if (!this.templatesDir) {
      throw new RenderError('missing_template', 'No report template or template directory configured');
    }

    const templatePath = path.join(this.templatesDir, REPORT_TEMPLATE_FILENAME);
    try {
      this.template = fs.readFileSync(templatePath, 'utf-8');
    } catch (error) {
      throw new RenderError('missing_template', `Report template not readable: ${templatePath}`, error);
    }
    return this.template;
  }
}

/**
 * Substitute `{{name}}` placeholders. Every placeholder must have a binding.
 */
export function bindTemplate(template: string, bindings: Record<string, string>): string {
  const unbound = new Set<string>();

  const output = template.replace(PLACEHOLDER_PATTERN, (match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(bindings, name)) {
      unbound.add(name);
      return match;
    }
    return bindings[name];
  });

  if (unbound.size > 0) {
    throw new RenderError('data_binding', `Template placeholders without a value: ${[...unbound].join(', ')}`);
  }

  return output;
}

/**
 * UTC, second precision, independent of host locale and timezone
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function reportTitle(meeting: Meeting): string {
  return meeting.title ? `${meeting.title} (${meeting.id})` : `Meeting ${meeting.id}`;
}

function renderHeader(meeting: Meeting): string {
  const state = getMeetingState(meeting);
  const meta: string[] = [
    `<li><strong>Meeting ID:</strong> ${escapeHtml(meeting.id)}</li>`,
    `<li><strong>Created by:</strong> ${escapeHtml(meeting.createdBy)}</li>`,
    `<li><strong>Created at:</strong> ${formatTimestamp(meeting.createdAt)}</li>`,
  ];

  if (meeting.link) {
    meta.push(`<li><strong>Link:</strong> <a href="${escapeHtml(meeting.link)}">${escapeHtml(meeting.link)}</a></li>`);
  }

  if (meeting.closed && meeting.closedAt) {
    meta.push(`<li><strong>Closed at:</strong> ${formatTimestamp(meeting.closedAt)}</li>`);
    if (meeting.closedBy) {
      meta.push(`<li><strong>Closed by:</strong> ${escapeHtml(meeting.closedBy)}</li>`);
    }
  }

  meta.push(`<li><strong>Total updates:</strong> ${meeting.updates.size}</li>`);

  return `<header class="report-header">
      <h1>${escapeHtml(reportTitle(meeting))}</h1>
      <span class="report-status status-${state}">${state === 'closed' ? 'Closed' : 'Open'}</span>
      <ul class="report-meta">
        ${meta.join('\n        ')}
      </ul>
    </header>`;
}

function renderUpdates(updates: Update[]): string {
  if (updates.length === 0) {
    return `<section class="no-updates" data-empty="true">
      <p>${NO_UPDATES_MESSAGE}</p>
    </section>`;
  }

  return `<section class="updates">
      ${updates.map(renderUpdate).join('\n      ')}
    </section>`;
}

function renderUpdate(update: Update): string {
  return `<article class="update">
        <h2>${escapeHtml(displayAuthor(update))}</h2>
        <p class="update-time">Submitted ${formatTimestamp(update.submittedAt)}</p>
        <h3>Progress</h3>
        <p>${escapeHtml(update.progress)}</p>
        <h3>Blockers</h3>
        <p>${escapeHtml(update.blockers)}</p>
        <h3>Goals</h3>
        <p>${escapeHtml(update.goals)}</p>
      </article>`;
}
