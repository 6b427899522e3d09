/**
 * Study-design labels offered to the classifier, in matching order,
 * with the badge colour used in the digest.
 */
export const PUBLICATION_TYPE_COLORS = {
  "Case Report": "#98fb98",
  "Case Series": "#8fbc8f",
  "Retrospective Case Control": "#b0c4de",
  "Retrospective Cohort": "#87cefa",
  "Cross-sectional Study": "#add8e6",
  "Prospective Cohort": "#e0b0ff",
  "Prospective Study": "#dda0dd",
  "Randomized Clinical Trial": "#ffa07a",
  "Non-randomized Trial": "#f4a460",
  "Systematic Review": "#ffb6c1",
  "Meta-Analysis": "#ffd700",
  "Narrative Review": "#eee8aa",
  "Clinical Practice Guideline": "#98fb98",
  "Technical Note": "#d3d3d3",
  "Biomechanical Study": "#afeeee",
  "Cadaveric Study": "#bc8f8f",
  "Animal Study": "#f0e68c",
  "Basic Science Research": "#7fffd4",
  "Quality Improvement": "#ff7f50",
  "Cost-effectiveness Analysis": "#da70d6",
  Other: "#f5f5f5",
} as const;

export type PublicationType = keyof typeof PUBLICATION_TYPE_COLORS;

export const DEFAULT_PUBLICATION_TYPE: PublicationType = "Other";

export const PUBLICATION_TYPES: readonly PublicationType[] = [
  "Case Report",
  "Case Series",
  "Retrospective Case Control",
  "Retrospective Cohort",
  "Cross-sectional Study",
  "Prospective Cohort",
  "Prospective Study",
  "Randomized Clinical Trial",
  "Non-randomized Trial",
  "Systematic Review",
  "Meta-Analysis",
  "Narrative Review",
  "Clinical Practice Guideline",
  "Technical Note",
  "Biomechanical Study",
  "Cadaveric Study",
  "Animal Study",
  "Basic Science Research",
  "Quality Improvement",
  "Cost-effectiveness Analysis",
  "Other",
];

function isPublicationType(value: string): value is PublicationType {
  return Object.prototype.hasOwnProperty.call(PUBLICATION_TYPE_COLORS, value);
}

export function publicationTypeColor(type: string): string {
  return isPublicationType(type)
    ? PUBLICATION_TYPE_COLORS[type]
    : PUBLICATION_TYPE_COLORS[DEFAULT_PUBLICATION_TYPE];
}
