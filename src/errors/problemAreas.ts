import { emptySelection, type CategorySelection } from './schema';

export const PROBLEM_AREA_NAMES = ['Style', 'Logical', 'Performance', 'Security', 'Design'] as const;
export type ProblemArea = (typeof PROBLEM_AREA_NAMES)[number];

export interface ProblemAreaConfig {
  icon: string;
  description: string;
  mapping: CategorySelection;
}

export const PROBLEM_AREAS: Record<ProblemArea, ProblemAreaConfig> = {
  Style: {
    icon: '✨',
    description: 'Naming conventions, whitespace, formatting, and documentation issues',
    mapping: { build: [], checkstyle: ['NamingConventionChecks', 'WhitespaceAndFormattingChecks', 'JavadocChecks'] },
  },
  Logical: {
    icon: '🧠',
    description: 'Logic flaws, incorrect conditionals, off-by-one errors, and algorithm issues',
    mapping: { build: ['LogicalErrors'], checkstyle: [] },
  },
  Performance: {
    icon: '⚡',
    description: 'Inefficient code, unnecessary operations, resource leaks, and optimization issues',
    mapping: { build: ['RuntimeErrors'], checkstyle: ['MetricsChecks'] },
  },
  Security: {
    icon: '🔒',
    description: 'Potential vulnerabilities, input validation issues, and unsafe operations',
    mapping: { build: ['RuntimeErrors', 'LogicalErrors'], checkstyle: ['CodeQualityChecks'] },
  },
  Design: {
    icon: '🏗️',
    description: 'Poor class design, code organization, and maintainability problems',
    mapping: { build: ['LogicalErrors'], checkstyle: ['MiscellaneousChecks', 'FileStructureChecks', 'BlockChecks'] },
  },
};

export function isProblemArea(value: string): value is ProblemArea {
  return PROBLEM_AREA_NAMES.some((area) => area === value);
}

/** Union of the areas' categories, first occurrence wins the position. */
export function mapProblemAreasToCategories(areas: readonly string[]): CategorySelection {
  const selected = emptySelection();
  for (const area of areas) {
    if (!isProblemArea(area)) continue;
    const { mapping } = PROBLEM_AREAS[area];
    for (const category of mapping.build) {
      if (!selected.build.includes(category)) selected.build.push(category);
    }
    for (const category of mapping.checkstyle) {
      if (!selected.checkstyle.includes(category)) selected.checkstyle.push(category);
    }
  }
  return selected;
}
