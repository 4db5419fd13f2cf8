/**
 * FactoryRegistry - mutable factory state with its own lifecycle
 *
 * Holds the hashlock -> escrow table, the resolver whitelist, the pause and
 * whitelist-bypass flags and one record per deployed escrow. Every mutation
 * is saved to the configured store before it takes effect.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Address, getAddress, type Hex, isAddress } from "viem";
import { z } from "zod";
import { EscrowRole, EscrowStatus, type EscrowRecord } from "../types/index.ts";
import { Logger, rootLogger } from "../utils/logger.ts";
import { ResourceLock } from "./locks.ts";

export interface RegistrySnapshot {
  owner: Address;
  paused: boolean;
  whitelistBypassed: boolean;
  resolvers: Address[];
  escrows: EscrowRecord[];
}

export interface RegistryStore {
  load(): Promise<RegistrySnapshot | undefined>;
  save(snapshot: RegistrySnapshot): Promise<void>;
}

export class MemoryRegistryStore implements RegistryStore {
  private snapshot?: RegistrySnapshot;

  load(): Promise<RegistrySnapshot | undefined> {
    return Promise.resolve(this.snapshot && structuredClone(this.snapshot));
  }

  save(snapshot: RegistrySnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
    return Promise.resolve();
  }
}

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "Invalid address")
  .transform((value): Address => getAddress(value));

const HexSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]*$/, "Invalid hex")
  .transform((value): Hex => `0x${value.slice(2)}`);

const RegistryFileSchema = z.object({
  owner: AddressSchema,
  paused: z.boolean(),
  whitelistBypassed: z.boolean(),
  resolvers: z.array(AddressSchema),
  escrows: z.array(
    z.object({
      address: AddressSchema,
      hashlock: HexSchema,
      role: z.nativeEnum(EscrowRole),
      digest: HexSchema,
      status: z.nativeEnum(EscrowStatus),
      deployedAt: z.string().regex(/^\d+$/).transform((value) => BigInt(value)),
    })
  ),
});

/**
 * Registry snapshot persisted as a JSON file (bigints as decimal strings)
 */
export class JsonFileRegistryStore implements RegistryStore {
  constructor(private filePath: string) {}

  async load(): Promise<RegistrySnapshot | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
    return RegistryFileSchema.parse(JSON.parse(raw));
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const serialized = JSON.stringify(
      snapshot,
      (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
      2
    );
    // Write-then-rename keeps the previous snapshot intact if the write fails
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, serialized, "utf8");
    await rename(tmpPath, this.filePath);
  }
}

export interface FactoryRegistryOptions {
  owner: Address;
  store?: RegistryStore;
  whitelistBypassed?: boolean;
  logger?: Logger;
}

export class FactoryRegistry {
  private initialized = false;
  private store: RegistryStore;
  private logger: Logger;
  private writeLock: ResourceLock;

  private ownerAddress: Address;
  private pausedFlag = false;
  private bypassFlag: boolean;
  private resolvers = new Set<string>();
  private escrowsByHashlock = new Map<string, Address>();
  private records = new Map<string, EscrowRecord>();

  constructor(options: FactoryRegistryOptions) {
    this.ownerAddress = getAddress(options.owner);
    this.bypassFlag = options.whitelistBypassed ?? false;
    this.store = options.store ?? new MemoryRegistryStore();
    this.logger = options.logger ?? rootLogger.child("Registry");
    this.writeLock = new ResourceLock("registry", this.logger);
  }

  /**
   * Load persisted state, if any. Must be called before use.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    const snapshot = await this.store.load();
    if (snapshot) {
      this.apply(snapshot);
      this.logger.info(`Registry restored with ${snapshot.escrows.length} escrows`);
    }
    this.initialized = true;
  }

  /**
   * Flush state and refuse further use
   */
  async close(): Promise<void> {
    if (!this.initialized) return;
    await this.persist();
    this.initialized = false;
  }

  get owner(): Address {
    return this.ownerAddress;
  }

  get paused(): boolean {
    this.ensureInitialized();
    return this.pausedFlag;
  }

  get whitelistBypassed(): boolean {
    this.ensureInitialized();
    return this.bypassFlag;
  }

  escrowFor(hashlock: Hex): Address | undefined {
    this.ensureInitialized();
    return this.escrowsByHashlock.get(hashlock.toLowerCase());
  }

  getRecord(escrow: Address): EscrowRecord | undefined {
    this.ensureInitialized();
    return this.records.get(escrow.toLowerCase());
  }

  listRecords(): EscrowRecord[] {
    this.ensureInitialized();
    return [...this.records.values()];
  }

  isWhitelisted(resolver: Address): boolean {
    this.ensureInitialized();
    return this.resolvers.has(resolver.toLowerCase());
  }

  listResolvers(): Address[] {
    this.ensureInitialized();
    return [...this.resolvers].map((resolver) => getAddress(resolver));
  }

  async recordEscrow(record: EscrowRecord): Promise<void> {
    this.ensureInitialized();
    if (this.escrowsByHashlock.has(record.hashlock.toLowerCase())) {
      throw new Error(`Hashlock ${record.hashlock} is already registered`);
    }
    await this.update((next) => {
      next.escrows.push({ ...record });
    });
  }

  /**
   * Drop a record whose deployment did not go through
   */
  async forgetEscrow(escrow: Address): Promise<void> {
    await this.update((next) => {
      next.escrows = next.escrows.filter(
        (record) => record.address.toLowerCase() !== escrow.toLowerCase()
      );
    });
  }

  async updateStatus(escrow: Address, status: EscrowStatus): Promise<void> {
    this.ensureInitialized();
    if (!this.records.has(escrow.toLowerCase())) {
      throw new Error(`Unknown escrow ${escrow}`);
    }
    await this.update((next) => {
      next.escrows = next.escrows.map((record) =>
        record.address.toLowerCase() === escrow.toLowerCase() ? { ...record, status } : record
      );
    });
  }

  async setPaused(paused: boolean): Promise<void> {
    await this.update((next) => {
      next.paused = paused;
    });
  }

  async setWhitelistBypass(bypassed: boolean): Promise<void> {
    await this.update((next) => {
      next.whitelistBypassed = bypassed;
    });
  }

  async addResolver(resolver: Address): Promise<void> {
    await this.update((next) => {
      if (!next.resolvers.some((entry) => entry.toLowerCase() === resolver.toLowerCase())) {
        next.resolvers.push(getAddress(resolver));
      }
    });
  }

  async removeResolver(resolver: Address): Promise<void> {
    await this.update((next) => {
      next.resolvers = next.resolvers.filter(
        (entry) => entry.toLowerCase() !== resolver.toLowerCase()
      );
    });
  }

  snapshot(): RegistrySnapshot {
    return {
      owner: this.ownerAddress,
      paused: this.pausedFlag,
      whitelistBypassed: this.bypassFlag,
      resolvers: [...this.resolvers].map((resolver) => getAddress(resolver)),
      escrows: [...this.records.values()].map((record) => ({ ...record })),
    };
  }

  private async persist(): Promise<void> {
    await this.store.save(this.snapshot());
  }

  /**
   * Writes are serialized; in-memory state follows only a successful save
   */
  private update(change: (next: RegistrySnapshot) => void): Promise<void> {
    this.ensureInitialized();
    return this.writeLock.withLock("snapshot", async () => {
      const next = this.snapshot();
      change(next);
      await this.store.save(next);
      this.apply(next);
    });
  }

  private apply(snapshot: RegistrySnapshot): void {
    this.ownerAddress = snapshot.owner;
    this.pausedFlag = snapshot.paused;
    this.bypassFlag = snapshot.whitelistBypassed;
    this.resolvers = new Set(snapshot.resolvers.map((resolver) => resolver.toLowerCase()));
    this.records = new Map();
    this.escrowsByHashlock = new Map();
    for (const record of snapshot.escrows) {
      this.records.set(record.address.toLowerCase(), { ...record });
      this.escrowsByHashlock.set(record.hashlock.toLowerCase(), record.address);
    }
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error("Registry not initialized. Call init() first.");
    }
  }
}
