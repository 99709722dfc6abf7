/** Configuration types — layered config system (base.yaml ← env.yaml ← file ← PVEKUBE_*). */
export type ClusterProfile = "single-node" | "single-master" | "ha-cluster";

export type BootstrapMethod = "kubeadm" | "kubespray";

export type InfrastructureTool = "auto" | "terraform" | "tofu";

export type ProxmoxConfig = {
  host: string;
  ssh_user: string;
  api_port: number;
  bridge: string;
  storage: string;
  required_tools: string[];
};

export type SshConfig = {
  private_key_path: string;
  public_key_path: string;
  connect_timeout_sec: number;
};

export type StorageConfig = {
  rbd_pool: string;
  rbd_image: string;
  size: string;
  mount_point: string;
};

export type ImageConfig = {
  url: string;
  mirror_url?: string;
  file_name: string;
  packages: string[];
  guest_user: string;
};

export type TemplateConfig = {
  vm_id: number;
  name: string;
  memory_mb: number;
  cores: number;
  disk_size: string;
};

export type AutomationUserConfig = {
  user: string;
  role: string;
  token_name: string;
  privileges: string[];
};

export type PackerConfig = {
  enabled: boolean;
  working_dir: string;
  template: string;
  env_file: string;
  golden_vm_id: number;
};

export type InfrastructureConfig = {
  tool: InfrastructureTool;
  working_dir: string;
  parallelism: number;
  apply_attempts: number;
  retry_delay_sec: number;
  inventory_output: string;
  vm_ids_output: string;
  control_plane_output: string;
  inventory_path: string;
  ip_wait_attempts: number;
  ip_wait_delay_sec: number;
};

export type KubernetesConfig = {
  version: string;
  bootstrap: BootstrapMethod;
  playbook: string;
  kubespray_dir: string;
  remote_user: string;
  remote_kubeconfig: string;
  kubeconfig_path: string;
};

export type ThresholdsConfig = {
  min_free_memory_gb: number;
  min_free_storage_gb: number;
};

export type ClusterConfig = {
  schema_version: string;
  profile: ClusterProfile;
  state_file: string;
  log_dir: string;
  verify_timeout_sec: number;
  proxmox: ProxmoxConfig;
  ssh: SshConfig;
  storage: StorageConfig;
  image: ImageConfig;
  template: TemplateConfig;
  automation_user: AutomationUserConfig;
  packer: PackerConfig;
  infrastructure: InfrastructureConfig;
  kubernetes: KubernetesConfig;
  thresholds: ThresholdsConfig;
  timeouts: Record<string, number>;
};
