import fs from "fs";
import path from "path";
import { DEFAULT_REPORT_NAME } from "./config";
import { duplicateGroups } from "./scanner";
import { ScanSummary } from "./types";

const fsp = fs.promises;

/**
 * Renders a scan summary as a Markdown document.
 *
 * Sections:
 * 1. Scan Counters
 * 2. File Extensions Count, by descending count
 * 3. Large Files, in discovery order
 * 4. Duplicate File Names, only names shared by more than one path
 *
 * Empty sections get an italic placeholder instead of a list.
 */
export function renderReport(summary: ScanSummary): string {
  let report = "# File System Scan Report\n\n";

  report += "## Scan Counters\n\n";
  report += `- **Total Discovered**: ${summary.counters.discovered}\n`;
  report += `- **Total Processed**:  ${summary.counters.processed}\n`;
  report += `- **Total Failed**:     ${summary.counters.failed}\n\n`;

  report += "## File Extensions Count\n\n";
  const extensions = Object.entries(summary.extensionCount).sort((a, b) => b[1] - a[1]);
  if (extensions.length > 0) {
    for (const [extension, count] of extensions) {
      report += `- **${extension}**: ${count}\n`;
    }
  } else {
    report += "_None found._\n";
  }
  report += "\n";

  report += "## Large Files\n\n";
  if (summary.largeFiles.length > 0) {
    for (const filePath of summary.largeFiles) {
      report += `- \`${filePath}\`\n`;
    }
  } else {
    report += "_None detected._\n";
  }
  report += "\n";

  report += "## Duplicate File Names\n\n";
  const groups = duplicateGroups(summary.duplicates);
  if (groups.length > 0) {
    for (const [name, paths] of groups) {
      report += `### \`${name}\`\n`;
      for (const filePath of paths) {
        report += `- \`${filePath}\`\n`;
      }
      report += "\n";
    }
  } else {
    report += "_No duplicates found._\n";
  }

  return report;
}

/**
 * Writes the rendered report into `outputDir`, creating it if needed.
 *
 * @returns Absolute path of the written report
 */
export async function writeReport(
  summary: ScanSummary,
  outputDir: string,
  filename: string = DEFAULT_REPORT_NAME
): Promise<string> {
  await fsp.mkdir(outputDir, { recursive: true });
  const reportPath = path.resolve(outputDir, filename);
  await fsp.writeFile(reportPath, renderReport(summary), "utf8");
  return reportPath;
}
