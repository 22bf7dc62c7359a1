// Application constants

export const APP_NAME = "Faultline";
export const APP_VERSION = "0.1.0";
