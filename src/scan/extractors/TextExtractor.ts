export interface TextExtractor {
  supports(filePath: string): boolean;
  // One entry per page, page 1 first
  extract(filePath: string): Promise<string[]>;
}
