/**
 * Dependency role: the collaborator the dependencies workflow delegates to.
 *
 * The executor only knows the single-method interface; which packages a CI
 * host needs is the operator's configuration, never decided here.
 */

import { STEP_NAMES } from "./constants";
import type { StepContext } from "./steps";
import type { StepResult } from "./types";

export interface DependencyInstaller {
  /** Install whatever the host needs, idempotently */
  install(ctx: StepContext): Promise<StepResult>;
}

/** Installs a fixed package list with the host's package manager */
export class PackageDependencyInstaller implements DependencyInstaller {
  constructor(private readonly packages: readonly string[]) {}

  async install(ctx: StepContext): Promise<StepResult> {
    const step = STEP_NAMES.installDependencies;
    if (this.packages.length === 0) {
      return { step, changed: false, detail: "no packages configured" };
    }

    const manager = await ctx.host.detectPackageManager();
    if (!manager) {
      throw new Error("No supported package manager found (dnf, yum, apt-get)");
    }

    const missing: string[] = [];
    for (const name of this.packages) {
      if (!(await ctx.host.isPackageInstalled(manager, name))) missing.push(name);
    }
    if (missing.length === 0) {
      return { step, changed: false, detail: `${this.packages.length} packages already installed` };
    }

    if (!ctx.check) {
      await ctx.host.installPackages(manager, missing);
    }
    return {
      step,
      changed: true,
      detail: `${ctx.check ? "would install" : "installed"} ${missing.join(", ")} with ${manager}`,
    };
  }
}
