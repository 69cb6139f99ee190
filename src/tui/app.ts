import blessed from "blessed";
import { CancelledError, describeError } from "../errors.js";
import type { CommandHandle } from "../services/commandQueue.js";
import type { Snapshot } from "../services/packageCatalog.js";
import { displayCommand } from "../services/scoopCommands.js";
import type { ScoopService } from "../services/scoopService.js";
import type { CommandRequest, PackageRecord } from "../types.js";

interface AppOptions {
  tool: string;
  debug?: boolean;
}

type View = "installed" | "search";

const KEY_HINTS =
  "r:refresh  s:search  tab:view  /:filter  i:install  u:update  U:update all  x:uninstall  c:cleanup  C:cleanup all  o:outdated  esc:cancel  q:quit";

export class ScoopTuiApp {
  private readonly screen = blessed.screen({
    smartCSR: true,
    fullUnicode: true,
    title: "scoopui"
  });

  private readonly list = blessed.list({
    parent: this.screen,
    top: 0,
    left: 0,
    width: "50%",
    height: "60%",
    border: "line",
    label: " Installed ",
    keys: false,
    vi: false,
    mouse: true,
    scrollbar: {
      ch: " "
    },
    style: {
      selected: {
        bg: "blue",
        fg: "white"
      }
    }
  });

  private readonly details = blessed.box({
    parent: this.screen,
    top: 0,
    left: "50%",
    width: "50%",
    height: "60%",
    border: "line",
    label: " Details ",
    tags: false,
    scrollable: true,
    alwaysScroll: true,
    keys: false,
    mouse: true,
    vi: true,
    content: "Select a package to view details."
  });

  private readonly output = blessed.log({
    parent: this.screen,
    top: "60%",
    left: 0,
    width: "100%",
    height: "32%",
    border: "line",
    label: " Log ",
    tags: false,
    scrollback: 2000,
    scrollbar: {
      ch: " "
    },
    mouse: true
  });

  private readonly footer = blessed.box({
    parent: this.screen,
    bottom: 0,
    left: 0,
    width: "100%",
    height: "8%",
    border: "line",
    tags: false,
    content: KEY_HINTS
  });

  private readonly question = blessed.question({
    parent: this.screen,
    border: "line",
    height: 8,
    width: "70%",
    top: "center",
    left: "center",
    label: " Confirm ",
    tags: false,
    keys: true,
    vi: true
  });

  private readonly prompt = blessed.prompt({
    parent: this.screen,
    border: "line",
    height: 9,
    width: "70%",
    top: "center",
    left: "center",
    label: " Input ",
    tags: false,
    keys: true,
    vi: true
  });

  private view: View = "installed";
  private allItems: readonly PackageRecord[] = [];
  private visibleItems: PackageRecord[] = [];
  private filterText = "";
  private lastQuery: string | undefined;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly service: ScoopService,
    private readonly options: AppOptions
  ) {}

  async start(): Promise<void> {
    this.bindKeys();
    this.bindServiceEvents();
    this.screen.render();
    await this.safeRefresh();
  }

  private bindKeys(): void {
    this.screen.key(["q", "C-c"], async () => {
      await this.quit();
    });

    this.screen.key(["j", "down"], () => this.moveSelection(1));
    this.screen.key(["k", "up"], () => this.moveSelection(-1));

    this.screen.key(["r"], async () => {
      await this.safeRefresh();
    });

    this.screen.key(["s"], async () => {
      await this.askSearch();
    });

    this.screen.key(["tab"], async () => {
      await this.toggleView();
    });

    this.screen.key(["/"], async () => {
      await this.askFilter();
    });

    this.screen.key(["i"], async () => {
      await this.safeInstallSelected();
    });

    this.screen.key(["u"], async () => {
      await this.safeUpdateSelected();
    });

    this.screen.key(["S-u"], async () => {
      await this.safeUpdateAll();
    });

    this.screen.key(["x"], async () => {
      await this.safeUninstallSelected();
    });

    this.screen.key(["c"], async () => {
      await this.safeCleanupSelected();
    });

    this.screen.key(["S-c"], async () => {
      await this.safeCleanupAll();
    });

    this.screen.key(["o"], async () => {
      await this.safeCheckUpdates();
    });

    this.screen.key(["escape"], () => {
      this.cancelRunning();
    });

    this.list.on("select", () => {
      this.renderDetails();
      this.screen.render();
    });
  }

  private bindServiceEvents(): void {
    this.service.events.on("output", ({ line }) => {
      this.output.log(line);
      this.screen.render();
    });

    this.service.events.on("request", (request) => {
      this.onRequestTransition(request);
    });
  }

  private onRequestTransition(request: CommandRequest): void {
    const command = displayCommand(request.kind, request.argument, this.options.tool);

    if (request.status === "running") {
      this.output.log(`$ ${command}`);
    } else if (request.status === "failed" || request.status === "cancelled") {
      this.output.log(`[${request.status}] ${command}`);
    } else if (request.status === "succeeded" && this.options.debug) {
      const elapsed = (request.finishedAt ?? 0) - (request.startedAt ?? 0);
      this.output.log(`[done] ${command} (${elapsed}ms)`);
    }

    this.screen.render();
  }

  private moveSelection(delta: number): void {
    if (this.visibleItems.length === 0) {
      return;
    }

    const current = this.selectedIndex();
    const next = Math.max(0, Math.min(this.visibleItems.length - 1, current + delta));
    this.list.select(next);
    this.renderDetails();
    this.screen.render();
  }

  private async safeRefresh(preferredIndex?: number): Promise<void> {
    try {
      this.setStatus("Loading installed packages...");
      const records = await this.track(this.service.listInstalled());
      this.showRecords("installed", records, preferredIndex);
      this.setStatus(`Loaded ${records.length} installed packages.`);
      this.screen.render();
    } catch (error) {
      this.onError(error);
    }
  }

  private async askSearch(): Promise<void> {
    const input = await this.promptInput("Search packages", this.lastQuery ?? "");
    if (input === null || !input.trim()) {
      this.setStatus("Search canceled.");
      this.screen.render();
      return;
    }

    try {
      const query = input.trim();
      this.setStatus(`Searching for ${query}...`);
      const records = await this.track(this.service.search(query));
      this.lastQuery = query;
      this.showRecords("search", records);
      this.setStatus(records.length > 0 ? `${records.length} result(s) for ${query}.` : `No results for ${query}.`);
      this.screen.render();
    } catch (error) {
      this.onError(error);
    }
  }

  private async toggleView(): Promise<void> {
    if (this.view === "search") {
      try {
        const installed = await this.service.getInstalled();
        this.showRecords("installed", installed);
        this.setStatus("Showing installed packages.");
        this.screen.render();
      } catch (error) {
        this.onError(error);
      }
      return;
    }

    const cached = this.lastQuery !== undefined ? this.service.catalog.getSearch(this.lastQuery) : undefined;
    if (!cached || this.lastQuery === undefined) {
      this.setStatus("No search results yet. Press s to search.");
      this.screen.render();
      return;
    }

    this.showRecords("search", cached);
    this.setStatus(`Showing results for ${this.lastQuery}.`);
    this.screen.render();
  }

  private async safeInstallSelected(): Promise<void> {
    const item = this.currentItem();
    if (!item || this.view !== "search") {
      this.setStatus("Select a search result to install.");
      this.screen.render();
      return;
    }

    const name = qualifiedName(item);
    await this.runMutation(`Install ${name}?`, `Installing ${name}...`, () => this.service.install(name));
  }

  private async safeUpdateSelected(): Promise<void> {
    const item = this.requireInstalledSelection("update");
    if (!item) {
      return;
    }
    await this.runMutation(`Update ${item.name}?`, `Updating ${item.name}...`, () =>
      this.service.update(item.name)
    );
  }

  private async safeUpdateAll(): Promise<void> {
    await this.runMutation("Run scoop update and update all packages?", "Updating all packages...", () =>
      this.service.updateAll()
    );
  }

  private async safeUninstallSelected(): Promise<void> {
    const item = this.requireInstalledSelection("uninstall");
    if (!item) {
      return;
    }

    const first = await this.confirm(`Run uninstall command?\n${displayCommand("uninstall", item.name, this.options.tool)}`);
    if (!first) {
      this.setStatus("Uninstall canceled.");
      this.screen.render();
      return;
    }

    await this.runMutation(`Confirm uninstall ${item.name}? (y/N)`, `Uninstalling ${item.name}...`, () =>
      this.service.uninstall(item.name)
    );
  }

  private async safeCleanupSelected(): Promise<void> {
    const item = this.requireInstalledSelection("clean up");
    if (!item) {
      return;
    }
    await this.runMutation(`Remove old versions of ${item.name}?`, `Cleaning up ${item.name}...`, () =>
      this.service.cleanup(item.name)
    );
  }

  private async safeCleanupAll(): Promise<void> {
    await this.runMutation("Remove old versions of all packages?", "Cleaning up all packages...", () =>
      this.service.cleanupAll()
    );
  }

  private async runMutation(
    question: string,
    progress: string,
    start: () => CommandHandle<{ output: string }>
  ): Promise<void> {
    const confirmed = await this.confirm(question);
    if (!confirmed) {
      this.setStatus("Canceled.");
      this.screen.render();
      return;
    }

    try {
      const previousIndex = this.selectedIndex();
      this.setStatus(progress);
      this.screen.render();
      await this.track(start());
      this.setStatus("Done. Refreshing installed packages...");
      this.screen.render();
      if (this.view === "installed") {
        await this.safeRefresh(previousIndex);
      }
    } catch (error) {
      this.onError(error);
    }
  }

  private async safeCheckUpdates(): Promise<void> {
    try {
      this.setStatus("Checking for updates...");
      const outdated = await this.track(this.service.checkUpdates());
      const installed = this.service.catalog.getInstalled();
      if (this.view === "installed" && installed) {
        this.showRecords("installed", installed, this.selectedIndex());
      }
      this.setStatus(
        outdated.length > 0
          ? `${outdated.length} update(s) available: ${outdated.map((record) => record.name).join(", ")}`
          : "Everything is up to date."
      );
      this.screen.render();
    } catch (error) {
      this.onError(error);
    }
  }

  private cancelRunning(): void {
    const running = this.service.pending().find((request) => request.status === "running");
    if (!running) {
      this.setStatus("Nothing is running.");
      this.screen.render();
      return;
    }

    this.service.cancel(running.id);
    this.setStatus(`Cancelling ${displayCommand(running.kind, running.argument, this.options.tool)}...`);
    this.screen.render();
  }

  private async quit(): Promise<void> {
    this.service.cancelAll();
    await Promise.all(this.inFlight);
    this.screen.destroy();
    process.exit(0);
  }

  private async track<T>(handle: CommandHandle<T>): Promise<T> {
    const settled = handle.result.then(
      () => undefined,
      () => undefined
    );
    this.inFlight.add(settled);
    try {
      return await handle.result;
    } finally {
      this.inFlight.delete(settled);
    }
  }

  private async askFilter(): Promise<void> {
    const input = await this.promptInput("Filter by name", this.filterText);
    if (input === null) {
      this.setStatus("Filter canceled.");
      this.screen.render();
      return;
    }

    this.filterText = input.trim();
    this.applyFilter();
    if (this.visibleItems.length > 0) {
      this.list.select(0);
      this.renderDetails();
    } else {
      this.details.setContent(`No packages match filter: ${this.filterText}`);
      this.setStatus("No results.");
    }

    this.screen.render();
  }

  private showRecords(view: View, records: Snapshot, preferredIndex?: number): void {
    this.view = view;
    this.allItems = records;
    this.list.setLabel(view === "installed" ? " Installed " : ` Search: ${this.lastQuery ?? ""} `);
    this.applyFilter();

    if (this.visibleItems.length > 0) {
      this.list.select(clampIndex(preferredIndex ?? 0, this.visibleItems.length));
      this.renderDetails();
    } else {
      this.details.setContent(view === "installed" ? "No packages installed." : "No packages found.");
    }
  }

  private applyFilter(): void {
    if (!this.filterText) {
      this.visibleItems = [...this.allItems];
    } else {
      const needle = this.filterText.toLowerCase();
      this.visibleItems = this.allItems.filter((item) => item.name.toLowerCase().includes(needle));
    }

    this.renderItems();
  }

  private renderItems(): void {
    if (this.visibleItems.length === 0) {
      this.list.setItems(["(empty)"]);
      this.list.select(0);
      return;
    }

    const width = Math.max(...this.visibleItems.map((item) => item.name.length));
    this.list.setItems(this.visibleItems.map((item) => formatRow(item, width)));
  }

  private currentItem(): PackageRecord | undefined {
    if (this.visibleItems.length === 0) {
      return undefined;
    }

    return this.visibleItems[this.selectedIndex()];
  }

  private requireInstalledSelection(action: string): PackageRecord | undefined {
    const item = this.currentItem();
    if (!item || this.view !== "installed") {
      this.setStatus(`Select an installed package to ${action}.`);
      this.screen.render();
      return undefined;
    }
    return item;
  }

  private selectedIndex(): number {
    const list = this.list as unknown as { selected?: number };
    return list.selected ?? 0;
  }

  private setStatus(message: string): void {
    const debugHint = this.options.debug ? "  [debug]" : "";
    this.footer.setContent(`${KEY_HINTS}\n${message}${debugHint}`);
  }

  private onError(error: unknown): void {
    if (error instanceof CancelledError) {
      this.setStatus("Cancelled.");
    } else {
      const message = describeError(error);
      this.output.log(`[error] ${message}`);
      this.setStatus(`Error: ${message.split("\n")[0] ?? message}`);
    }
    this.screen.render();
  }

  private renderDetails(): void {
    const item = this.currentItem();
    if (!item) {
      this.details.setContent("No selection.");
      return;
    }
    this.details.setContent(formatDetails(item));
  }

  private confirm(message: string): Promise<boolean> {
    return new Promise((resolve) => {
      (this.question as unknown as { ask: (msg: string, cb: (...args: unknown[]) => void) => void }).ask(
        message,
        (...args: unknown[]) => {
          const answer = args[args.length - 1];
          resolve(Boolean(answer));
        }
      );
    });
  }

  private promptInput(label: string, initialValue: string): Promise<string | null> {
    return new Promise((resolve) => {
      (
        this.prompt as unknown as {
          input: (msg: string, value: string, cb: (err: unknown, result: string | null) => void) => void;
        }
      ).input(`${label}:`, initialValue, (_err: unknown, value: string | null) => {
        resolve(value);
      });
    });
  }
}

function formatRow(item: PackageRecord, nameWidth: number): string {
  const update = item.updatedVersion ? ` -> ${item.updatedVersion}` : "";
  const source = item.source ? `  [${item.source}]` : "";
  return `${item.name.padEnd(nameWidth)}  ${item.version}${update}${source}`;
}

function formatDetails(item: PackageRecord): string {
  const lines = [`Name: ${item.name}`, `Version: ${item.version || "-"}`, `Source: ${item.source || "-"}`];

  if (item.updatedVersion) {
    lines.push(`Update available: ${item.updatedVersion}`);
  }
  if (item.updated) {
    lines.push(`Updated: ${item.updated}`);
  }
  if (item.binaries) {
    lines.push(`Binaries: ${item.binaries}`);
  }
  if (item.info) {
    lines.push("", item.info);
  }

  return lines.join("\n");
}

// Search results from other buckets need the bucket prefix to install.
function qualifiedName(item: PackageRecord): string {
  return item.source && !item.name.includes("/") ? `${item.source}/${item.name}` : item.name;
}

function clampIndex(index: number, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return Math.max(0, Math.min(length - 1, index));
}
