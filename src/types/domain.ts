// This file defines the monitoring domain model shared by adapters, query handlers, and the access gate.

export const SERVICE_STATES = ['active', 'inactive', 'failed', 'activating', 'deactivating', 'reloading'] as const;
export type ServiceState = (typeof SERVICE_STATES)[number];

export type LogOrder = 'asc' | 'desc';
export type IpFamily = 'ipv4' | 'ipv6';

export interface ServiceRecord {
  unit: string;
  description: string;
  load_state: string;
  active_state: string;
  sub_state: string;
  unit_file_state?: string;
  since_utc?: string;
  main_pid?: number;
  exec_main_status?: number;
  result?: string;
}

export interface LogEntry {
  timestamp_utc: string;
  unit?: string;
  priority: number;
  hostname?: string;
  pid?: number;
  message?: string;
  cursor?: string;
}

export interface LogWindow {
  start: Date;
  end: Date;
}

export interface LogReadRequest {
  window: LogWindow;
  priorityThreshold?: number;
  unit?: string;
}

export interface UnitLister {
  listUnits(): Promise<ServiceRecord[]>;
}

export interface LogReader {
  read(request: LogReadRequest): Promise<LogEntry[]>;
}

export interface CidrRule {
  network: string;
  prefix: number;
  family: IpFamily;
}

export interface AuthContext {
  authenticated: true;
  clientIp: string;
}

// Outputs are type aliases so they stay assignable to MCP structuredContent records.
export type ListServicesOutput = {
  services: ServiceRecord[];
  total: number;
  returned: number;
  truncated: boolean;
  generated_at_utc: string;
};

export type ListLogsOutput = {
  entries: LogEntry[];
  total_scanned: number;
  returned: number;
  truncated: boolean;
  generated_at_utc: string;
  window: {
    start_utc: string;
    end_utc: string;
  };
};
