// =============================================================================
// VERSION PROVIDER
// =============================================================================

export type VersionQuery = {
  // Normalized names; empty means "everything installed".
  names: readonly string[];
  timeoutMs: number;
};

export type UpgradeRequest = {
  requirementsPath: string;
  timeoutMs: number;
};

export interface InstalledVersionProvider {
  /** Normalized name -> installed version. Failures surface as VersionProviderError. */
  getInstalledVersions(query: VersionQuery): Promise<Map<string, string>>;
  upgrade?(request: UpgradeRequest): Promise<void>;
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

export interface EnvironmentInspector {
  isVirtualEnvActive(): Promise<boolean>;
  isRepositoryDirty(dir: string): Promise<boolean>;
}
