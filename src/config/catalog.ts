import { AUTHORITY_REGULATION, DocumentCategory } from "../types";
import type { AppConfig, SelectableType } from "./types";

export const DOCUMENT_TYPES: Record<DocumentCategory, readonly string[]> = {
  act: ["statute", "statute-consolidated", "statute-translated", "statute-aland", "statute-sami"],
  judgment: ["kko", "kho"],
  doc: ["government-proposal", "treaty", "treaty-consolidated", AUTHORITY_REGULATION],
};

export interface HarvestTarget {
  selectedAs: SelectableType;
  category: DocumentCategory;
  documentType: string;
  startYear: number;
  endYear: number;
}

export function getYearRange(yearsBack: number, now = new Date()): [number, number] {
  const currentYear = now.getFullYear();
  return [currentYear - yearsBack + 1, currentYear];
}

/**
 * Expands the selected types into the ordered (category, document type) pairs
 * to harvest. A pair selected twice keeps its first position and year window.
 */
export function planTargets(config: Pick<AppConfig, "types" | "years" | "yearOverrides">, now = new Date()): HarvestTarget[] {
  const targets: HarvestTarget[] = [];
  const seen = new Set<string>();
  const add = (target: HarvestTarget): void => {
    const key = `${target.category}/${target.documentType}`;
    if (!seen.has(key)) {
      seen.add(key);
      targets.push(target);
    }
  };

  for (const selected of config.types) {
    const [startYear, endYear] = getYearRange(config.yearOverrides[selected] ?? config.years, now);

    if (selected === "authority-regulation") {
      add({ selectedAs: selected, category: "doc", documentType: AUTHORITY_REGULATION, startYear, endYear });
      continue;
    }

    for (const documentType of DOCUMENT_TYPES[selected]) {
      add({ selectedAs: selected, category: selected, documentType, startYear, endYear });
    }
  }

  return targets;
}
