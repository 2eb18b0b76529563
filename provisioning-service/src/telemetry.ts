/**
 * Shape of the records the drone producer publishes, both to the ThingsBoard
 * device API and to the Kafka topic. The ClickHouse ingestion table reads the
 * topic with JSONEachRow, so column names here must match these keys exactly.
 */
export interface DroneTelemetry {
  drone_id: string;
  latitude: number;
  longitude: number;
  battery: number;
  altitude: number;
  speed: number;
  timestamp_ms: number;
}

export interface ColumnDef {
  name: keyof DroneTelemetry;
  type: string;
}

export const TELEMETRY_COLUMNS: readonly ColumnDef[] = [
  { name: 'drone_id', type: 'String' },
  { name: 'latitude', type: 'Float64' },
  { name: 'longitude', type: 'Float64' },
  { name: 'battery', type: 'Float64' },
  { name: 'altitude', type: 'Float64' },
  { name: 'speed', type: 'Float64' },
  { name: 'timestamp_ms', type: 'UInt64' },
];
