export {
  UNKNOWN_SOURCE,
  formatAccessDate,
  formatCitation,
  generateCitation,
  generateCitations,
  type CitationOptions
} from "./citation-generator"
