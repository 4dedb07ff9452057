import { describe, it, expect, beforeEach } from "vitest";
import {
  ciUserSpec,
  ensureUser,
  ensureUserDirectories,
  grantPasswordlessSudo,
  installAuthorizedKey,
  type EnsuredUser,
  type StepContext,
} from "../steps";
import { METADATA_KEY_URL } from "../constants";
import { DEFAULT_SUDOERS, FakeHost } from "../testing";

const KEY = "ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAItestkey ci@example\n";
const SOURCE = { url: METADATA_KEY_URL, timeoutSeconds: 10 };
const MUTATIONS = ["createUser", "writeFile", "makeDirectory", "setOwner", "fetchUrl", "installPackages"];

let host: FakeHost;
let ctx: StepContext;

beforeEach(() => {
  host = new FakeHost();
  ctx = { host, check: false };
  host.metadata.set(METADATA_KEY_URL, KEY);
});

async function ensured(name = "ci-bot"): Promise<EnsuredUser> {
  const { user } = await ensureUser(ctx, ciUserSpec(name));
  return user;
}

describe("ensureUser", () => {
  it("creates a missing account with the CI comment and home", async () => {
    const result = await ensureUser(ctx, ciUserSpec("ci-bot"));

    expect(result.changed).toBe(true);
    expect(result.user.name).toBe("ci-bot");
    expect(result.user.home).toBe("/home/ci-bot");
    expect(result.user.authorizedKeysPath).toBe("/home/ci-bot/.ssh/authorized_keys");
    expect(host.users.has("ci-bot")).toBe(true);
    expect(host.entry("/home/ci-bot")?.owner).toBe("ci-bot");
  });

  it("leaves an existing account alone", async () => {
    host.users.add("ci-bot");

    const result = await ensureUser(ctx, ciUserSpec("ci-bot"));

    expect(result.changed).toBe(false);
    expect(host.operations).toEqual(["userExists ci-bot"]);
  });

  it("uses the fixed comment", () => {
    expect(ciUserSpec("ci-bot")).toEqual({ name: "ci-bot", comment: "OpenShift CI User", home: "/home/ci-bot" });
  });
});

describe("grantPasswordlessSudo", () => {
  it("appends the entry and validates the candidate file", async () => {
    const user = await ensured();

    const result = await grantPasswordlessSudo(ctx, user);

    expect(result.changed).toBe(true);
    expect(host.entry("/etc/sudoers")?.content).toBe(`${DEFAULT_SUDOERS}ci-bot  ALL=(ALL)  NOPASSWD: ALL\n`);
    expect(host.writes).toEqual([
      { path: "/etc/sudoers", options: { owner: "root", mode: 0o440, validate: "visudo -cf %s" } },
    ]);
  });

  it("replaces an existing entry for the user", async () => {
    host.putFile("/etc/sudoers", "root ALL=(ALL) ALL\nci-bot ALL=(ALL) ALL\n", "root", 0o440);
    const user = await ensured();

    await grantPasswordlessSudo(ctx, user);

    expect(host.entry("/etc/sudoers")?.content).toBe("root ALL=(ALL) ALL\nci-bot  ALL=(ALL)  NOPASSWD: ALL\n");
  });

  it("replaces only the last matching line", async () => {
    host.putFile("/etc/sudoers", "ci-bot ALL=(ALL) ALL\nroot ALL=(ALL) ALL\nci-bot-old ALL=(ALL) ALL\n", "root", 0o440);
    const user = await ensured();

    await grantPasswordlessSudo(ctx, user);

    expect(host.entry("/etc/sudoers")?.content).toBe(
      "ci-bot ALL=(ALL) ALL\nroot ALL=(ALL) ALL\nci-bot  ALL=(ALL)  NOPASSWD: ALL\n",
    );
  });

  it("does not rewrite a file that already grants the user", async () => {
    const content = `${DEFAULT_SUDOERS}ci-bot  ALL=(ALL)  NOPASSWD: ALL\n`;
    host.putFile("/etc/sudoers", content, "root", 0o440);
    const user = await ensured();

    const result = await grantPasswordlessSudo(ctx, user);

    expect(result.changed).toBe(false);
    expect(host.writes).toEqual([]);
    expect(host.entry("/etc/sudoers")?.content).toBe(content);
  });

  it("escapes regex characters in the user name", async () => {
    host.putFile("/etc/sudoers", "ciXbot ALL=(ALL) ALL\n", "root", 0o440);
    const user = await ensured("ci.bot");

    await grantPasswordlessSudo(ctx, user);

    expect(host.entry("/etc/sudoers")?.content).toBe("ciXbot ALL=(ALL) ALL\nci.bot  ALL=(ALL)  NOPASSWD: ALL\n");
  });

  it("fails when the sudoers file is missing", async () => {
    host.entries.delete("/etc/sudoers");
    const user = await ensured();

    await expect(grantPasswordlessSudo(ctx, user)).rejects.toThrow(
      "/etc/sudoers does not exist or is not a regular file",
    );
  });

  it("propagates a rejected candidate file", async () => {
    host.failures.set("writeFile", new Error("visudo: syntax error near line 3"));
    const user = await ensured();

    await expect(grantPasswordlessSudo(ctx, user)).rejects.toThrow("visudo: syntax error near line 3");
    expect(host.entry("/etc/sudoers")?.content).toBe(DEFAULT_SUDOERS);
  });
});

describe("ensureUserDirectories", () => {
  it("creates .ssh inside the new home", async () => {
    const user = await ensured();

    const result = await ensureUserDirectories(ctx, user);

    expect(result).toEqual({ step: "ensure home directories", changed: true, detail: "/home/ci-bot/.ssh" });
    expect(host.entry("/home/ci-bot/.ssh")).toMatchObject({ type: "directory", owner: "ci-bot" });
  });

  it("takes ownership of a home created by someone else", async () => {
    host.putDirectory("/home/ci-bot", "root");
    host.putDirectory("/home/ci-bot/.ssh", "root");
    const user = await ensured();

    const result = await ensureUserDirectories(ctx, user);

    expect(result.detail).toBe("/home/ci-bot, /home/ci-bot/.ssh");
    expect(host.entry("/home/ci-bot")?.owner).toBe("ci-bot");
    expect(host.entry("/home/ci-bot/.ssh")?.owner).toBe("ci-bot");
  });

  it("is a no-op when both directories are in place", async () => {
    const user = await ensured();
    await ensureUserDirectories(ctx, user);
    host.operations.length = 0;

    const result = await ensureUserDirectories(ctx, user);

    expect(result.changed).toBe(false);
    expect(host.operations).toEqual(["stat /home/ci-bot", "stat /home/ci-bot/.ssh"]);
  });

  it("fails when .ssh is a file", async () => {
    const user = await ensured();
    host.putFile("/home/ci-bot/.ssh", "", "ci-bot");

    await expect(ensureUserDirectories(ctx, user)).rejects.toThrow("/home/ci-bot/.ssh exists and is not a directory");
  });
});

describe("installAuthorizedKey", () => {
  async function prepared(): Promise<EnsuredUser> {
    const user = await ensured();
    await ensureUserDirectories(ctx, user);
    return user;
  }

  it("writes the fetched key owned by the user with mode 0600", async () => {
    const user = await prepared();

    const result = await installAuthorizedKey(ctx, user, SOURCE);

    expect(result.changed).toBe(true);
    expect(host.entry("/home/ci-bot/.ssh/authorized_keys")).toEqual({
      type: "file",
      owner: "ci-bot",
      mode: 0o600,
      content: KEY,
    });
  });

  it("reports no change when the key is current", async () => {
    const user = await prepared();
    await installAuthorizedKey(ctx, user, SOURCE);

    const result = await installAuthorizedKey(ctx, user, SOURCE);

    expect(result.changed).toBe(false);
    expect(host.writes.map((write) => write.path)).toEqual(["/home/ci-bot/.ssh/authorized_keys"]);
  });

  it("overwrites a stale key and keeps extra permission bits", async () => {
    const user = await prepared();
    host.putFile("/home/ci-bot/.ssh/authorized_keys", "ssh-rsa AAAAold\n", "root", 0o644);

    await installAuthorizedKey(ctx, user, SOURCE);

    expect(host.entry("/home/ci-bot/.ssh/authorized_keys")).toEqual({
      type: "file",
      owner: "ci-bot",
      mode: 0o644,
      content: KEY,
    });
  });

  it("adds u+rw to a read-only key file", async () => {
    const user = await prepared();
    host.putFile("/home/ci-bot/.ssh/authorized_keys", KEY, "ci-bot", 0o400);

    const result = await installAuthorizedKey(ctx, user, SOURCE);

    expect(result.changed).toBe(true);
    expect(host.entry("/home/ci-bot/.ssh/authorized_keys")?.mode).toBe(0o600);
  });

  it("fetches from an overridden URL", async () => {
    const user = await prepared();
    host.metadata.set("http://metadata.test/key", "ssh-ed25519 AAAAother\n");

    await installAuthorizedKey(ctx, user, { url: "http://metadata.test/key", timeoutSeconds: 3 });

    expect(host.entry("/home/ci-bot/.ssh/authorized_keys")?.content).toBe("ssh-ed25519 AAAAother\n");
  });

  it("propagates fetch failures without touching the file", async () => {
    const user = await prepared();
    host.metadata.set(METADATA_KEY_URL, new Error("curl: (28) Connection timed out after 10001 milliseconds"));

    await expect(installAuthorizedKey(ctx, user, SOURCE)).rejects.toThrow("curl: (28)");
    expect(host.entry("/home/ci-bot/.ssh/authorized_keys")).toBeUndefined();
  });
});

describe("check mode", () => {
  it("reports every step as changed on a fresh host without mutating it", async () => {
    const check: StepContext = { host, check: true };

    const { user, changed } = await ensureUser(check, ciUserSpec("ci-bot"));
    const results = [
      changed,
      (await grantPasswordlessSudo(check, user)).changed,
      (await ensureUserDirectories(check, user)).changed,
      (await installAuthorizedKey(check, user, SOURCE)).changed,
    ];

    expect(results).toEqual([true, true, true, true]);
    expect(host.operations.filter((op) => MUTATIONS.includes(op.split(" ")[0]))).toEqual([]);
    expect(host.users.has("ci-bot")).toBe(false);
    expect(host.entry("/etc/sudoers")?.content).toBe(DEFAULT_SUDOERS);
  });
});
