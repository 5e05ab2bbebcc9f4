/**
 * Recuento final de una construcción
 */
export interface BuildStats {
  dirsCreated: number;
  filesCreated: number;
  skipped: number;
  excluded: number;
  fencesFailed: number;
}

export const EMPTY_BUILD_STATS: Readonly<BuildStats> = {
  dirsCreated: 0,
  filesCreated: 0,
  skipped: 0,
  excluded: 0,
  fencesFailed: 0,
};
