import type { z } from "zod";
import { ServiceUnavailableError, ShellConnectionError, errorMessage } from "../errors.js";
import { jsonValueSchema, type JsonValue } from "../json.js";
import {
  listingSchema,
  machineSchema,
  monitoringEnrolmentSchema,
  shellResultSchema,
  type BackendServices,
  type CloudInventory,
  type Machine,
  type MachineProbe,
  type MonitoringService,
  type RemoteShell,
  type ShellResult,
  type ShellTarget,
} from "./types.js";

const UNAVAILABLE_STATUSES = new Set([502, 503, 504]);

export interface HttpGatewayOptions {
  baseUrl: string;
  timeoutMs: number;
}

type HttpMethod = "GET" | "POST";

/**
 * Client for the backend gateway: the service that owns provider
 * credentials, SSH keys and monitoring enrolment for every user.
 */
export class HttpBackendGateway implements CloudInventory, MachineProbe, RemoteShell, MonitoringService {
  private readonly baseUrl: string;

  constructor(private readonly opts: HttpGatewayOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
  }

  listSizes(user: string, backendId: string): Promise<JsonValue[]> {
    return this.request("GET", this.backendPath(user, backendId, "sizes"), listingSchema);
  }

  listLocations(user: string, backendId: string): Promise<JsonValue[]> {
    return this.request("GET", this.backendPath(user, backendId, "locations"), listingSchema);
  }

  listImages(user: string, backendId: string): Promise<JsonValue[]> {
    return this.request("GET", this.backendPath(user, backendId, "images"), listingSchema);
  }

  listMachines(user: string, backendId: string): Promise<Machine[]> {
    return this.request("GET", this.backendPath(user, backendId, "machines"), machineSchema.array());
  }

  async disableBackend(user: string, backendId: string): Promise<void> {
    await this.request("POST", this.backendPath(user, backendId, "disable"), jsonValueSchema, {});
  }

  probeSsh(user: string, backendId: string, machineId: string, host: string): Promise<JsonValue> {
    return this.request("POST", this.machinePath(user, backendId, machineId, "probe"), jsonValueSchema, { host });
  }

  ping(host: string): Promise<JsonValue> {
    return this.request("POST", "/ping", jsonValueSchema, { host });
  }

  async run(user: string, target: ShellTarget, command: string): Promise<ShellResult> {
    const path = this.machinePath(user, target.backendId, target.machineId, "shell");
    try {
      return await this.request("POST", path, shellResultSchema, {
        host: target.host,
        command,
        keyId: target.keyId,
        username: target.username,
        password: target.password,
        port: target.port,
      });
    } catch (e) {
      // The gateway answers 502 when it cannot reach the machine itself
      if (e instanceof ServiceUnavailableError && e.status === 502) {
        throw new ShellConnectionError(`cannot connect to ${target.host}: ${e.message}`, target.host);
      }
      throw e;
    }
  }

  enable(user: string, backendId: string, machine: Machine, publicIps: string[]): Promise<{ command: string }> {
    return this.request(
      "POST",
      this.machinePath(user, backendId, machine.id, "monitoring"),
      monitoringEnrolmentSchema,
      { name: machine.name, publicIps }
    );
  }

  services(): BackendServices {
    return { inventory: this, probe: this, shell: this, monitoring: this };
  }

  private backendPath(user: string, backendId: string, leaf: string): string {
    return `/users/${encodeURIComponent(user)}/backends/${encodeURIComponent(backendId)}/${leaf}`;
  }

  private machinePath(user: string, backendId: string, machineId: string, leaf: string): string {
    return `${this.backendPath(user, backendId, "machines")}/${encodeURIComponent(machineId)}/${leaf}`;
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, JsonValue>
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { "content-type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (e) {
      throw new ServiceUnavailableError(`${method} ${path} failed: ${errorMessage(e)}`);
    }

    if (UNAVAILABLE_STATUSES.has(res.status)) {
      throw new ServiceUnavailableError(`${method} ${path} returned ${res.status}`, res.status);
    }
    if (!res.ok) {
      const text = (await res.text()).slice(0, 500);
      throw new Error(`${method} ${path} returned ${res.status}: ${text}`);
    }

    const raw: unknown = res.status === 204 ? null : await res.json();
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`${method} ${path} returned an unexpected body: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}
