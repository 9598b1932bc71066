/**
 * Where the agent's browser comes from. Exactly one source applies.
 */
export type BrowserTarget =
	| { kind: 'cloud'; use_cloud: true }
	| { kind: 'cdp'; cdp_url: string; is_local: true }
	| {
			kind: 'local';
			headless: boolean;
			executable_path?: string;
			user_data_dir?: string;
			profile_directory?: string;
	  };

export interface ProxySettings {
	server: string;
}

export interface BrowserProfileOptions {
	enable_default_extensions: boolean;
	allowed_domains?: string[];
	proxy?: ProxySettings;
	downloads_path?: string;
}
