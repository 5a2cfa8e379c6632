export interface SpaceBudget {
  maxTotalSpace: number;
  reservedSpace: number;
  enabled: boolean;
  updatedAt: Date;
  updatedBy: string;
}

export type SpaceCategory = 'sourceFiles' | 'outputFiles' | 'tempFiles';

export type SpaceBreakdown = Record<SpaceCategory, number>;

export interface SpaceUsageSnapshot {
  totalSpace: number;
  usedSpace: number;
  availableSpace: number;
  reservedSpace: number;
  pendingReservations: number;
  usagePercentage: number;
  hasSufficientSpace: boolean;
  enabled: boolean;
  breakdown: SpaceBreakdown;
  calculatedAt: Date;
  stale: boolean;
}

export interface SpaceRequirement {
  originalFileSize: number;
  estimatedOutputSize: number;
  tempFileSize: number;
  totalRequiredSize: number;
  compressionRatio: number;
}

export interface SpaceCheckDetails {
  originalFileSpace: number;
  outputFileSpace: number;
  tempFileSpace: number;
  reservedSpace: number;
  pendingReservations: number;
  currentUsedSpace: number;
  totalConfiguredSpace: number;
}

export interface SpaceCheckResult {
  hasEnoughSpace: boolean;
  requiredSpace: number;
  availableSpace: number;
  message: string;
  breakdown: SpaceCheckDetails;
}
