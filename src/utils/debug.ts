let debugMode = false;

export const setDebugMode = (enabled: boolean) => {
	debugMode = enabled;
};

// Helper function for debug logging. Goes to stderr since stdout carries titles.
export const debugLog = (scope: string, ...args: unknown[]) => {
	if (debugMode) {
		console.error(`[${scope}]`, ...args);
	}
};

// Function to check if debug mode is on
export const isDebugMode = () => debugMode;
