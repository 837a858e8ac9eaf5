export const BRAND_NAME = "trackart";

const BRAND_RUNTIME_VERSION = process.env.npm_package_version || "0.1.0";
export const BRAND_USER_AGENT = `${BRAND_NAME}/${BRAND_RUNTIME_VERSION}`;
