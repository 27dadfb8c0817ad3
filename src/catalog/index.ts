export { RuleCatalog, loadCatalog, type RuleCatalogSource } from './rule_catalog.js';
export { MarkdownRuleSource, parseRuleDocument, splitFrontMatter, type ParsedRuleDocument } from './markdown_source.js';
