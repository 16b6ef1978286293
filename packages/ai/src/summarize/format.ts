import type { ConsultationSummary } from "@consult-scribe/core";

const SECTIONS: Array<[string, keyof Pick<ConsultationSummary, "symptoms" | "diagnosis" | "medication" | "careAdvice">]> = [
  ["Symptoms", "symptoms"],
  ["Diagnosis", "diagnosis"],
  ["Medication", "medication"],
  ["Care advice", "careAdvice"],
];

export function formatSummary(summary: ConsultationSummary): string {
  const lines: string[] = [];
  SECTIONS.forEach(([title, key], index) => {
    lines.push(`${index + 1}. ${title}:`);
    for (const line of summary[key].split("\n")) {
      if (line.trim() !== "") lines.push(`   ${line.trim()}`);
    }
  });
  lines.push(`(model: ${summary.model}, ${summary.summaryTime.toFixed(2)}s)`);
  return lines.join("\n");
}
