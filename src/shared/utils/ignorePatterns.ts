import patternGroups from "../data/defaultIgnorePatterns.json";

// Patrones de ignorado clasificados por stack / tipo de fichero (ver JSON).
export const defaultIgnorePatterns: string[] = [
  ...new Set(Object.values(patternGroups).flat()),
];
