/**
 * NetworkMonitor
 *
 * In-process Network Gate. The host feeds it connectivity transitions
 * (from its platform's reachability API); the engine reads the current state,
 * subscribes to changes and asks whether an operation class may run on the
 * current link.
 */

import type {
    ConnectionQuality,
    ConnectionType,
    ConnectivityListener,
    NetworkGate,
    OperationClass,
} from '../types';

const QUALITY_RANK: Record<ConnectionQuality, number> = {
  None: 0,
  Poor: 1,
  Fair: 2,
  Good: 3,
  Excellent: 4,
};

// Minimum link quality per operation class while connected
const MINIMUM_QUALITY: Record<OperationClass, ConnectionQuality> = {
  Authentication: 'Poor',
  ClockEvent: 'Fair',
  PhotoUpload: 'Good',
  LocationSync: 'Poor',
  ReportSync: 'Fair',
  CheckpointSync: 'Poor',
  DataDownload: 'Good',
  Default: 'Fair',
};

const TYPE_QUALITY: Record<ConnectionType, ConnectionQuality> = {
  WiFi: 'Excellent',
  Ethernet: 'Excellent',
  Cellular: 'Good',
  Bluetooth: 'Fair',
  Unknown: 'Poor',
};

export function classifyConnection(isConnected: boolean, connectionTypes: readonly ConnectionType[]): ConnectionQuality {
  if (!isConnected) return 'None';

  return connectionTypes.reduce<ConnectionQuality>(
    (best, type) => (QUALITY_RANK[TYPE_QUALITY[type]] > QUALITY_RANK[best] ? TYPE_QUALITY[type] : best),
    'Poor'
  );
}

export interface NetworkState {
  isConnected: boolean;
  connectionTypes: ConnectionType[];
}

export class NetworkMonitor implements NetworkGate {
  private isConnectedInner: boolean;
  private connectionTypesInner: ConnectionType[];
  private listeners: Set<ConnectivityListener> = new Set();

  constructor(initial: Partial<NetworkState> = {}) {
    this.isConnectedInner = initial.isConnected ?? false;
    this.connectionTypesInner = [...(initial.connectionTypes ?? [])];
  }

  get isConnected(): boolean {
    return this.isConnectedInner;
  }

  get connectionTypes(): readonly ConnectionType[] {
    return this.connectionTypesInner;
  }

  get quality(): ConnectionQuality {
    return classifyConnection(this.isConnectedInner, this.connectionTypesInner);
  }

  /**
   * Record a platform connectivity report. Listeners hear only actual
   * connected/disconnected transitions.
   */
  setStatus(isConnected: boolean, connectionTypes: ConnectionType[] = []): void {
    const changed = this.isConnectedInner !== isConnected;
    this.isConnectedInner = isConnected;
    this.connectionTypesInner = isConnected ? [...connectionTypes] : [];

    if (changed) {
      console.info(`[NetworkMonitor] Connectivity changed: ${isConnected ? 'connected' : 'disconnected'} (${this.quality})`);
      this.notifyListeners(isConnected);
    }
  }

  onConnectivityChange(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  shouldAttemptOperation(operation: OperationClass): boolean {
    if (!this.isConnectedInner) {
      // Sign-in may still be attempted against cached credentials
      return operation === 'Authentication';
    }
    return QUALITY_RANK[this.quality] >= QUALITY_RANK[MINIMUM_QUALITY[operation]];
  }

  private notifyListeners(isConnected: boolean): void {
    for (const listener of this.listeners) {
      try {
        listener(isConnected);
      } catch (error) {
        console.error('Error in connectivity listener:', error);
      }
    }
  }
}
