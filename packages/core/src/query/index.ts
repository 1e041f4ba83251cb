export { IdentifierQuoter } from './identifier-quoter';
export type { QuotePair } from './identifier-quoter';
export { sanitizeBindingName, placeholderFor, BindingList } from './binding-sanitizer';
export { ConditionTree } from './condition-tree';
export type { Conjunction, ConditionDialect, ConditionEntry, GroupEntry, TreeEntry } from './condition-tree';
export { scanPlaceholders, placeholderNames, toPositional } from './placeholders';
export type { PlaceholderStyle, PlaceholderToken, PositionalStatement } from './placeholders';
export { QueryContext } from './query-context';
export type { QueryContextOptions, QueryObserver } from './query-context';
export { Query } from './query';
export type { LeftJoinDescriptor, Ordering, WhereCallback, WhereMap, WhereValue } from './query';
