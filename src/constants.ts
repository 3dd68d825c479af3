export const PRODUCT_NAME = "pawnup";
export const PRODUCT_VERSION = "0.3.0";
export const USER_AGENT = `${PRODUCT_NAME}/${PRODUCT_VERSION}`;

export const CONFIG_FILE_NAME = "config.json";
export const TOOLCHAINS_DIR = "toolchains";

export const CONFIG_HOME_ENV = "PAWNUP_CONFIG_HOME";
export const TOOLCHAIN_HOME_ENV = "PAWNUP_TOOLCHAIN_HOME";
export const CUSTOM_TOOLCHAIN_HOME_ENV = "PAWNUP_CUSTOM_TOOLCHAIN_HOME";
export const TOOLCHAIN_ENV = "PAWNUP_TOOLCHAIN";

export const SUPER_VERSION_PREFIX = ":";
export const LATEST_SENTINEL = "latest";

export const DEFAULT_SELECTOR = "stable";
export const DEFAULT_ROOT_URL = "https://sm.alliedmods.net/smdrop/";
export const DEFAULT_MAX_DOWNLOAD_SIZE = 75_000_000;

// Subtree of a SourceMod package that holds the compiler and its includes.
export const SCRIPTING_ROOT = "addons/sourcemod/scripting/";
export const INCLUDE_DIR = "include";

const WIDE_ARCHES = ["arm64", "loong64", "ppc64", "riscv64", "s390x", "x64"];

export const COMPILER_FILE_NAME =
  (WIDE_ARCHES.includes(process.arch) ? "spcomp64" : "spcomp") + (process.platform === "win32" ? ".exe" : "");

// smdrop names its archives after these platform identifiers.
export const PLATFORM_ID = process.platform === "win32" ? "windows" : process.platform === "darwin" ? "mac" : process.platform;

export const REMOTE_LIST_CONCURRENCY = 4;

export const COMMON_FETCH_OPTS: RequestInit = {
  cache: "no-cache",
  redirect: "follow",
  headers: {
    "User-Agent": USER_AGENT
  }
};
