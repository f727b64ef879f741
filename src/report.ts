import { RepairReport } from "./fixer";

const RULE = "=".repeat(72);

/** Human-readable summary of a repair run, one entry per line. */
export function formatReport(report: RepairReport): string[] {
  const lines = [
    RULE,
    `TIMING REPAIR: ${report.inputPath}`,
    RULE,
    `Samplers scanned:  ${report.samplersScanned}`,
    `Samplers repaired: ${report.repaired.length}`,
    `Samplers failed:   ${report.failures.length}`,
    `Bytes rewritten:   ${report.bytesWritten}`,
  ];

  if (report.repaired.length > 0) {
    lines.push("", `[+] REPAIRED (${report.repaired.length}):`);
    for (const r of report.repaired) {
      lines.push(
        `  - ${r.animationName} sampler ${r.samplerIndex}: accessor ${r.accessorIndex}, ` +
          `${r.count} keyframes, ${r.min.toFixed(3)}s to ${r.max.toFixed(3)}s`
      );
    }
  }

  if (report.failures.length > 0) {
    lines.push("", `[!] FAILED (${report.failures.length}):`);
    for (const f of report.failures) {
      lines.push(
        `  - ${f.animationName} (animation ${f.animationIndex}) sampler ${f.samplerIndex}: ${f.kind}: ${f.reason}`
      );
    }
  }

  if (report.anomalies.length > 0) {
    lines.push("", `[?] ADVISORIES (${report.anomalies.length}):`);
    for (const a of report.anomalies) {
      lines.push(`  - ${a.kind}: ${a.message}`);
    }
  }

  lines.push(
    "",
    `Output: ${report.outputMetadataPath}`,
    `        ${report.outputBinaryPath}`,
    RULE
  );
  return lines;
}
