/**
 * Parses a list file into ordered relative paths.
 * Swap in a custom parser for list files that are not one path per line.
 */
export type ListFileParser = (filePath: string) => string[];
