export type Relation = "equal" | "different" | "sub" | "super";

export type Selector = { kind: "alias"; name: string } | { kind: "super"; version: string };

export type HomeKind = "custom" | "cache";

export type ToolchainHome = {
  kind: HomeKind;
  path: string;
};

export type ToolchainLocation = {
  home: ToolchainHome;
  path: string;
};

export type FoundToolchain = ToolchainLocation & {
  name: string;
};

export type InstalledToolchains = {
  home: ToolchainHome;
  names: string[];
};

export type DirectoryItem = { kind: "directory"; href: string } | { kind: "file"; href: string };

export type Branch = {
  name: string;
};

export type RemoteVersion = {
  url: string;
  fileName: string;
  target: string | null;
  version: string | null;
};

export type RelevantUrl = {
  url: string;
  rawVersion: string;
  version: string;
};

export type ArchiveKind = "zip" | "tar.gz";

export type ArchiveEntry = {
  path: string;
  stream: AsyncIterable<Buffer>;
  isDirectory: boolean;
};

export type Archive = {
  kind: ArchiveKind;
  entries(): AsyncIterable<ArchiveEntry>;
};

export type SourceParams = {
  rootUrl: string;
  maxDownloadSize: number;
};

export type ConfigData = {
  default: string;
  aliases: Record<string, string>;
  source: SourceParams;
};

export type ToolchainSource = "env" | "config";

export type InstalledFile = {
  entry: string;
  destination: string;
};
