export { RubricRegistry, compareDimensionIds } from "./rubric-registry.ts";
export { parseDimensionDocument } from "./dimension-parser.ts";
export {
  parseFrontmatter,
  splitSections,
  parseBulletList,
  type ParsedMarkdown,
} from "./markdown.ts";
export { RubricError, type RubricErrorCode } from "./errors.ts";
