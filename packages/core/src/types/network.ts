export type ConnectionType = 'wifi' | 'ethernet' | 'cellular' | 'unknown';

export interface NetworkInfo {
  connected: boolean;
  type: ConnectionType;
  metered: boolean;
}

export interface NetworkMonitor {
  getNetworkInfo(): Promise<NetworkInfo>;
}
