import type { BrowserConfig } from '../config/schema.js';
import type { BrowserProfileOptions, BrowserTarget } from './views.js';

/**
 * Cloud browser first, then an existing browser over CDP, then a local launch.
 */
export function resolveBrowserTarget(config: BrowserConfig): BrowserTarget {
	if (config.useCloud) {
		return { kind: 'cloud', use_cloud: true };
	}

	if (config.useExistingBrowser) {
		return { kind: 'cdp', cdp_url: config.cdpUrl, is_local: true };
	}

	return {
		kind: 'local',
		headless: config.headless,
		...(config.executablePath ? { executable_path: config.executablePath } : {}),
		...(config.userDataDir ? { user_data_dir: config.userDataDir } : {}),
		...(config.profileDirectory ? { profile_directory: config.profileDirectory } : {}),
	};
}

/**
 * Profile settings layered on top of the browser, or undefined when every
 * setting is left at its default.
 */
export function buildBrowserProfile(config: BrowserConfig): BrowserProfileOptions | undefined {
	const profile: BrowserProfileOptions = {
		enable_default_extensions: config.enableDefaultExtensions,
	};
	if (config.allowedDomains && config.allowedDomains.length > 0) {
		profile.allowed_domains = [...config.allowedDomains];
	}
	if (config.proxyServer) {
		profile.proxy = { server: config.proxyServer };
	}
	if (config.downloadsPath) {
		profile.downloads_path = config.downloadsPath;
	}

	const customized =
		!config.enableDefaultExtensions ||
		profile.allowed_domains !== undefined ||
		profile.proxy !== undefined ||
		profile.downloads_path !== undefined;
	return customized ? profile : undefined;
}
