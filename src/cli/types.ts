import type { OptionValues } from 'commander';

// Options parsed by Commander
export interface CliOptions extends OptionValues {
  // Target
  namespace?: string; // Namespace to evaluate
  kinds?: string; // Kinds to evaluate, comma-separated
  exclude?: string; // Names never reported as prunable, comma-separated

  // Kubernetes
  kubeconfig?: string;
  context?: string;
  timeout?: string; // Milliseconds before cluster listing is aborted

  // Output
  style?: string; // text, json or yaml
  output?: string; // Report file path

  config?: string; // Path to a custom config file

  verbose?: boolean;
  quiet?: boolean;
}
