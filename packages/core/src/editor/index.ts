export { isNestedData, readProp, propExists, writeProp } from './nested-data';
export type { NestedData } from './nested-data';
export { pkeySeparator, pkeyToValue, pkeyToArray } from './primary-key';
export type { PkeyToArrayOptions } from './primary-key';
export { Field } from './field';
export type {
  FieldAction,
  FieldError,
  FieldSet,
  FieldValidator,
  Formatter,
  ValidationContext,
  FieldValue,
  ValueSource,
} from './field';
export { splitTableAlias } from './editor-host';
export type { EditorHost } from './editor-host';
export { compareLabels, orderColumns, mergeLeftJoins, requestFlag } from './option-helpers';
export { Options } from './options';
export type { OptionItem, OptionRenderer, OptionsFunction } from './options';
export { SearchPaneOptions } from './search-pane-options';
export type {
  PaneLabelRenderer,
  SearchPaneOption,
  SearchPaneRequest,
  SearchPaneRequestOptions,
} from './search-pane-options';
export { SearchBuilderOptions } from './search-builder-options';
export type { BuilderLabelRenderer, SearchBuilderOption } from './search-builder-options';
export { Join } from './join';
export type { JoinType, JoinValidator } from './join';
export { Mjoin } from './mjoin';
export { ServerSideProcessing } from './ssp';
export type { QueryScope, SspColumn, SspInfo, SspOrder, SspRequest } from './ssp';
export { RowEditor } from './row-writer';
export type { EditorReadResponse, EditorWriteResponse, RowEditorOptions } from './row-writer';
