export { buildBrowserProfile, resolveBrowserTarget } from './target.js';
export type { BrowserProfileOptions, BrowserTarget, ProxySettings } from './views.js';
