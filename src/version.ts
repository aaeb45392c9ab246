/** Package release */
export const PACKAGE_VERSION = '0.1.0';

/** Latest DSL revision this package writes and understands */
export const DSL_VERSION = '0.1.0';
