/** Injection token for the list of renderers the registry starts with */
export const REPORT_RENDERERS = Symbol('REPORT_RENDERERS');
