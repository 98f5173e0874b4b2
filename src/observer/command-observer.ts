/**
 * hoststate — Command-based System Observer
 *
 * Runs a fixed set of read-only shell commands per category through a
 * CommandExecutor and parses their output. Optional facts (temperature,
 * board model) are left out when their command fails; a failed required
 * command fails the whole category.
 */

import type { ScanCategory } from '../types/state.js';
import type { StateMap } from '../types/value.js';
import { isStateList } from '../types/value.js';
import { ObserverError, StateError, errorMessage } from '../types/errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import {
  ROM_EXTENSIONS,
  parseControllers,
  parseDf,
  parseEmulators,
  parseIpAddr,
  parseLoadavg,
  parseMeminfo,
  parseModel,
  parseOsRelease,
  parseRomCounts,
  parseRomSystems,
  parseRunningServices,
  parseTemperature,
  parseUptime,
} from '../parser/host-facts-parser.js';
import type { CommandExecutor, CommandResult, ScanContext, SystemObserver } from './types.js';

const ROM_ROOT_PATTERN = /^[A-Za-z0-9_./~$-]+$/;

const EMULATOR_ROOT = '/opt/retropie/emulators';
const RETROARCH_INPUT_CONFIGS =
  '/opt/retropie/configs/all/retroarch.cfg /opt/retropie/configs/all/retroarch-joypads/*.cfg';
const ROM_FIND = `find . -mindepth 2 -type f \\( ${ROM_EXTENSIONS.map((ext) => `-iname '*.${ext}'`).join(' -o ')} \\)`;

export interface CommandObserverOptions {
  /** Directory whose subdirectories are ROM systems; `$HOME` is expanded by the shell. */
  romRoot: string;
  logger?: Logger;
}

export class CommandObserver implements SystemObserver {
  private readonly executor: CommandExecutor;
  private readonly romRoot: string;
  private readonly logger: Logger;

  constructor(executor: CommandExecutor, options: CommandObserverOptions) {
    if (!ROM_ROOT_PATTERN.test(options.romRoot)) {
      throw new StateError('INVALID_CONFIG', `Unsafe ROM root path: ${options.romRoot}`);
    }
    this.executor = executor;
    this.romRoot = options.romRoot;
    this.logger = options.logger ?? silentLogger;
  }

  async scan(category: ScanCategory, context: ScanContext): Promise<StateMap> {
    switch (category) {
      case 'system':
        return this.scanSystem(context);
      case 'hardware':
        return this.scanHardware(context);
      case 'network':
        return this.scanNetwork(context);
      case 'software':
        return this.scanSoftware(context);
      case 'services':
        return this.scanServices(context);
      case 'gaming':
        return this.scanGaming(context);
      default: {
        const _exhaustive: never = category;
        throw new ObserverError(category, `Unknown category: ${String(_exhaustive)}`);
      }
    }
  }

  // ----------------------------------------------------------------
  // categories
  // ----------------------------------------------------------------

  private async scanSystem(ctx: ScanContext): Promise<StateMap> {
    const hostname = (await this.required('system', 'hostname', ctx)).trim();
    const meminfo = await this.optional('system', 'cat /proc/meminfo', ctx);
    const df = await this.optional('system', 'df -B1 /', ctx);
    const loadavg = await this.optional('system', 'cat /proc/loadavg', ctx);
    const uptime = await this.optional('system', 'cat /proc/uptime', ctx);
    const temp = await this.optional('system', 'cat /sys/class/thermal/thermal_zone0/temp', ctx);

    return {
      hostname,
      ...(temp !== undefined ? parseTemperature(temp) : {}),
      ...(meminfo !== undefined ? parseMeminfo(meminfo) : {}),
      ...(df !== undefined ? parseDf(df) : {}),
      ...(loadavg !== undefined ? parseLoadavg(loadavg) : {}),
      ...(uptime !== undefined ? parseUptime(uptime) : {}),
    };
  }

  private async scanHardware(ctx: ScanContext): Promise<StateMap> {
    const architecture = (await this.required('hardware', 'uname -m', ctx)).trim();
    const model = await this.optional('hardware', 'cat /proc/device-tree/model', ctx);
    const cores = await this.optional('hardware', 'nproc', ctx);
    const coreCount = cores !== undefined ? Number.parseInt(cores.trim(), 10) : Number.NaN;

    return {
      architecture,
      ...(model !== undefined ? parseModel(model) : {}),
      ...(Number.isInteger(coreCount) ? { cpu_cores: coreCount } : {}),
    };
  }

  private async scanNetwork(ctx: ScanContext): Promise<StateMap> {
    return parseIpAddr(await this.required('network', 'ip -o -4 addr show', ctx));
  }

  private async scanSoftware(ctx: ScanContext): Promise<StateMap> {
    const kernel = (await this.required('software', 'uname -r', ctx)).trim();
    const osRelease = await this.optional('software', 'cat /etc/os-release', ctx);
    return {
      kernel,
      ...(osRelease !== undefined ? { os: parseOsRelease(osRelease) } : {}),
    };
  }

  private async scanServices(ctx: ScanContext): Promise<StateMap> {
    return parseRunningServices(
      await this.required(
        'services',
        'systemctl list-units --type=service --state=running --no-legend --plain --no-pager',
        ctx,
      ),
    );
  }

  private async scanGaming(ctx: ScanContext): Promise<StateMap> {
    // Every gaming fact is optional: a host without RetroPie has none of them
    const listing = await this.optional('gaming', `ls -1 "${this.romRoot}"`, ctx);
    const romFiles =
      listing !== undefined
        ? await this.optional('gaming', `cd "${this.romRoot}" && ${ROM_FIND}`, ctx)
        : undefined;
    const emulators = await this.optional('gaming', `ls -1 ${EMULATOR_ROOT}`, ctx);
    const devices = await this.optional('gaming', 'cat /proc/bus/input/devices', ctx);
    const inputConfig =
      devices !== undefined
        ? await this.optional('gaming', `cat ${RETROARCH_INPUT_CONFIGS} 2>/dev/null; true`, ctx)
        : undefined;

    const systems = listing !== undefined ? parseRomSystems(listing) : {};
    const romSystems = isStateList(systems['rom_systems']) ? systems['rom_systems'].map(String) : [];
    return {
      ...systems,
      ...(romFiles !== undefined ? parseRomCounts(romFiles, romSystems) : {}),
      ...(emulators !== undefined ? parseEmulators(emulators) : {}),
      ...(devices !== undefined ? parseControllers(devices, inputConfig) : {}),
    };
  }

  // ----------------------------------------------------------------
  // execution
  // ----------------------------------------------------------------

  private async exec(
    category: ScanCategory,
    command: string,
    ctx: ScanContext,
  ): Promise<CommandResult> {
    try {
      return await this.executor.run(command, ctx);
    } catch (err) {
      throw new ObserverError(
        category,
        `Command "${command}" could not be run: ${errorMessage(err)}`,
        ctx.signal.aborted ? 'SCAN_ABORTED' : 'SCAN_FAILED',
        err,
      );
    }
  }

  private async required(category: ScanCategory, command: string, ctx: ScanContext): Promise<string> {
    const result = await this.exec(category, command, ctx);
    if (result.exitCode !== 0) {
      throw new ObserverError(
        category,
        `Command "${command}" exited with ${result.exitCode}: ${result.stderr.trim()}`,
      );
    }
    return result.stdout;
  }

  private async optional(
    category: ScanCategory,
    command: string,
    ctx: ScanContext,
  ): Promise<string | undefined> {
    const result = await this.exec(category, command, ctx);
    if (result.exitCode !== 0) {
      this.logger.debug('Optional fact unavailable', { category, command, exitCode: result.exitCode });
      return undefined;
    }
    return result.stdout;
  }
}
