export const PRODUCT_NAME = 'swift-backtrace';
export const CLI_NAME = 'swift-backtrace-helper';

export const CONFIG_FILE_NAME = 'swift-backtrace-helper.config.json';
