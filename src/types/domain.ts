// Domain types used across the app (stable)

export type ContainerState =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'removing'
  | 'exited'
  | 'dead';

export type ContainerNetwork = {
  name: string;
  id: string;
};

export type Container = {
  id: string;
  name: string;
  image: string;
  state: ContainerState;
  status: string;        // human status from the daemon, e.g. "Up 3 minutes"
  created: number;       // unix seconds
  ports: string;
  labels: Record<string, string>;
  networks: ContainerNetwork[];
  volumes: string[];     // named volumes mounted by the container
};

export type Image = {
  id: string;
  tags: string[];
  size: number;
  created: number;
  containers: number;
};

export type Network = {
  id: string;
  name: string;
  driver: string;
  scope: string;
  internal: boolean;
  created: string;       // ISO
};

export type Volume = {
  name: string;
  driver: string;
  mountpoint: string;
  created: string;       // ISO
  scope: string;
};

export type Group = {
  id: string;
  name: string;
  description: string;
  containerIds: string[];
  created: string;       // ISO
  modified: string;      // ISO
  color: string;
};

export type ComposeStatus = 'running' | 'partial' | 'stopped';

export type ComposeService = {
  name: string;
  containers: Container[];
};

export type ComposeProject = {
  name: string;
  workingDir: string;
  services: ComposeService[];
  status: ComposeStatus;
};

export type LogRecord = {
  stream: 'stdout' | 'stderr';
  line: string;
};

export type StatsSample = {
  cpuPercent: number;
  memoryUsage: number;
  memoryLimit: number;
  memoryPercent: number;
  networkRx: number;
  networkTx: number;
  blockRead: number;
  blockWrite: number;
  pids: number;
  at: string;            // ISO
};

export type NetworkAttachment = {
  name: string;
  id?: string;
  aliases?: string[];
};

export type PortBinding = {
  hostIp: string;
  hostPort: string;
};

export type HostConfig = {
  binds: string[];
  portBindings: Record<string, PortBinding[]>;
  networkMode: string;
  privileged: boolean;
  capAdd: string[];
  capDrop: string[];
  restartPolicy: { name: string; maximumRetryCount: number };
};

// Everything needed to create a container again after it has been removed.
export type ContainerSpec = {
  name: string;
  image: string;
  env: string[];
  cmd?: string[];
  entrypoint?: string[];
  workingDir?: string;
  user?: string;
  tty: boolean;
  openStdin: boolean;
  labels: Record<string, string>;
  hostConfig: HostConfig;
  networks: NetworkAttachment[];   // first one is attached at create time
};

export type EnvVar = {
  key: string;
  value: string;
};

export type View =
  | 'containers'
  | 'images'
  | 'groups'
  | 'volumes'
  | 'compose'
  | 'networks'
  | 'about'
  | 'logs'
  | 'stats'
  | 'env';

export type MainView = Exclude<View, 'logs' | 'stats' | 'env'>;

export const MAIN_VIEWS: readonly MainView[] = [
  'containers',
  'images',
  'groups',
  'volumes',
  'compose',
  'networks',
  'about',
];

export type ResourceKind = 'containers' | 'images' | 'networks' | 'volumes' | 'groups';

export const SYSTEM_NETWORKS: readonly string[] = ['bridge', 'host', 'none'];

export function isSystemNetwork(network: Pick<Network, 'name'>): boolean {
  return SYSTEM_NETWORKS.includes(network.name);
}
