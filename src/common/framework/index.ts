export * from './errors.js';
export * from './values.js';
export * from './params.js';
export * from './sweep.js';
export * from './format/args_formatter.js';
export * from './format/number_format.js';
export * from './format/value_formatter.js';
export * from './processors/processor.js';
export * from './processors/print.js';
export * from './processors/bash_file.js';
