const GIB = 1024 ** 3;

export const DISK_SIZE_BYTES = 20 * GIB;
export const MEMORY_MB = 2048;
export const SWAP_MB = MEMORY_MB;

export const HOSTNAME = 'UnifiNetworkController';
export const MANAGEMENT_PORT = 8443;
export const NETWORK_INTERFACE = 'eth0';

export const SETUP_REMOTE_PATH = '/setup.sh';
export const SETUP_MODE = 0o755;

export const ROOTDIR_CONTENT = 'rootdir';

// Menu layout: label column gets OFFSET extra cells, the list widget adds CHROME.
export const MENU_LABEL_OFFSET = 2;
export const MENU_CHROME_WIDTH = 23;
