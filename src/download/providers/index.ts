/**
 * Provider index - exports the download engines
 */

export { YtDlpProvider, buildYtDlpArgs, extractDiagnostic, parsePrintedPaths } from './YtDlpProvider';
export type { YtDlpProviderOptions } from './YtDlpProvider';
