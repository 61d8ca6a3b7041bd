export type {
  BindingLogger,
  BindingMap,
  NoMatchPolicy,
  TokenPair
} from './bindings';
export type {
  BindingSchema,
  ResolvedWriterOptions,
  WriterOptions
} from './options';
