/**
 * Render a local meeting snapshot to an HTML file for checking the report
 * template without closing a real meeting.
 *
 * Usage: npx tsx server/scripts/preview-report.ts --input json/<meeting-id>/meeting.json [--output preview.html]
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseMeeting } from '../src/meetings/meeting.js';
import { ReportRenderer } from '../src/services/report-renderer.js';
import { getTemplatesPath } from '../src/config.js';

interface PreviewArgs {
  input: string;
  output: string;
}

function parseArgs(argv: string[]): PreviewArgs {
  let input: string | undefined;
  let output = 'preview.html';

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--input' || arg === '-i') && next) {
      input = next;
      i++;
    } else if ((arg === '--output' || arg === '-o') && next) {
      output = next;
      i++;
    }
  }

  if (!input) {
    throw new Error('Usage: preview-report --input <meeting.json> [--output preview.html]');
  }

  return { input, output };
}

async function main(): Promise<void> {
  const { input, output } = parseArgs(process.argv.slice(2));

  const meeting = parseMeeting(await fs.readFile(input, 'utf8'));
  const renderer = new ReportRenderer({ templatesDir: getTemplatesPath() });
  const document = renderer.render(meeting);

  await fs.writeFile(output, document, 'utf8');
  console.log(`Report for ${meeting.id} written to ${path.resolve(output)}`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
