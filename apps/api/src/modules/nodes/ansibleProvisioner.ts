import type { CommandResult, CommandRunner } from "./commandRunner";

type AnsibleProvisionerOptions = {
  runner: CommandRunner;
  inventoryPath: string;
  playbookBin?: string;
  playbook: string;
  extraArgs?: string[];
  timeoutMs: number;
};

/**
 * Runs the Kubespray scale playbook limited to a single host, so nodes that already joined
 * the cluster are never touched. The result is returned as-is; a non-zero exit is for the
 * caller to judge.
 */
export class AnsibleProvisioner {
  private readonly runner: CommandRunner;
  private readonly inventoryPath: string;
  private readonly playbookBin: string;
  private readonly playbook: string;
  private readonly extraArgs: string[];
  private readonly timeoutMs: number;

  constructor(opts: AnsibleProvisionerOptions) {
    this.runner = opts.runner;
    this.inventoryPath = opts.inventoryPath;
    this.playbookBin = opts.playbookBin ?? "ansible-playbook";
    this.playbook = opts.playbook;
    this.extraArgs = opts.extraArgs ?? [];
    this.timeoutMs = opts.timeoutMs;
  }

  buildArgs(hostname: string): string[] {
    return ["--inventory", this.inventoryPath, this.playbook, `--limit=${hostname}`, ...this.extraArgs];
  }

  provision(hostname: string): Promise<CommandResult> {
    return this.runner.run(this.playbookBin, this.buildArgs(hostname), {
      timeoutMs: this.timeoutMs,
      env: { ...process.env, ANSIBLE_FORCE_COLOR: "false" },
    });
  }
}
