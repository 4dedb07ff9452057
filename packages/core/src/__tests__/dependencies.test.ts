import { describe, it, expect } from "vitest";
import { PackageDependencyInstaller } from "../dependencies";
import { FakeHost } from "../testing";

describe("PackageDependencyInstaller", () => {
  it("installs only the missing packages", async () => {
    const host = new FakeHost();
    host.installed.add("git");

    const result = await new PackageDependencyInstaller(["git", "podman", "jq"]).install({ host, check: false });

    expect(result).toEqual({
      step: "install dependencies",
      changed: true,
      detail: "installed podman, jq with dnf",
    });
    expect(host.operations).toContain("installPackages dnf podman jq");
  });

  it("is a no-op once everything is installed", async () => {
    const host = new FakeHost();
    host.packageManager = "apt-get";
    const installer = new PackageDependencyInstaller(["git", "jq"]);
    await installer.install({ host, check: false });

    const result = await installer.install({ host, check: false });

    expect(result).toEqual({ step: "install dependencies", changed: false, detail: "2 packages already installed" });
  });

  it("does nothing without a package list", async () => {
    const host = new FakeHost();

    const result = await new PackageDependencyInstaller([]).install({ host, check: false });

    expect(result.changed).toBe(false);
    expect(host.operations).toEqual([]);
  });

  it("reports what it would install in check mode", async () => {
    const host = new FakeHost();
    host.packageManager = "yum";

    const result = await new PackageDependencyInstaller(["git"]).install({ host, check: true });

    expect(result.detail).toBe("would install git with yum");
    expect(host.installed.size).toBe(0);
  });

  it("fails on hosts without a supported package manager", async () => {
    const host = new FakeHost();
    host.packageManager = null;

    await expect(new PackageDependencyInstaller(["git"]).install({ host, check: false })).rejects.toThrow(
      "No supported package manager found (dnf, yum, apt-get)",
    );
  });
});
