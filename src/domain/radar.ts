/**
 * Radar payload domain model.
 *
 * The response body of GET /radar and the content of the on-disk JSON
 * side-cache, plus the lifecycle stages a single request moves through.
 */

/** A single sampled grid cell. Longitude is in [-180, 180). */
export interface RadarPoint {
  lat: number;
  lon: number;
  value: number;
}

export interface RadarMetadata {
  units: string;
  long_name: string;
  /** Always the configured remote-source URL. */
  source: string;
}

export interface RadarPayload {
  timestamp: string;
  metadata: RadarMetadata;
  points: RadarPoint[];
}

/** Per-request pipeline stages. */
export enum PipelineStage {
  Idle = 'idle',
  CacheCheck = 'cache_check',
  Fetching = 'fetching',
  Extracting = 'extracting',
  Decoding = 'decoding',
  Transforming = 'transforming',
  Responding = 'responding',
}

/**
 * Valid stage transitions. Any stage may short-circuit to Responding on
 * failure or when the JSON side-cache is reused. Fetching goes straight
 * to Decoding when a failed refetch falls back to the stale grid.
 */
export const VALID_STAGE_TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  [PipelineStage.Idle]: [PipelineStage.CacheCheck, PipelineStage.Responding],
  [PipelineStage.CacheCheck]: [PipelineStage.Fetching, PipelineStage.Decoding, PipelineStage.Responding],
  [PipelineStage.Fetching]: [PipelineStage.Extracting, PipelineStage.Decoding, PipelineStage.Responding],
  [PipelineStage.Extracting]: [PipelineStage.Decoding, PipelineStage.Responding],
  [PipelineStage.Decoding]: [PipelineStage.Transforming, PipelineStage.Responding],
  [PipelineStage.Transforming]: [PipelineStage.Responding],
  [PipelineStage.Responding]: [],
};

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return VALID_STAGE_TRANSITIONS[from].includes(to);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRadarPoint(value: unknown): value is RadarPoint {
  return (
    isRecord(value) &&
    typeof value.lat === 'number' &&
    typeof value.lon === 'number' &&
    typeof value.value === 'number'
  );
}

/** Shape check for a payload read back from the side-cache. */
export function isRadarPayload(value: unknown): value is RadarPayload {
  if (!isRecord(value)) return false;
  const { timestamp, metadata, points } = value;
  return (
    typeof timestamp === 'string' &&
    isRecord(metadata) &&
    typeof metadata.units === 'string' &&
    typeof metadata.long_name === 'string' &&
    typeof metadata.source === 'string' &&
    Array.isArray(points) &&
    points.every(isRadarPoint)
  );
}
