/**
 * hoststate — Host fact パーサー
 *
 * Linux コマンド出力（/proc/meminfo, df, ip addr, os-release など）を
 * StateMap に変換する純粋関数群。入力が想定外の形でも例外は投げず、
 * 取り出せたフィールドだけを返す。
 */

import type { StateMap, StateValue } from '../types/value.js';
import { toMapKey } from '../types/value.js';

// ============================================================
// ヘルパー
// ============================================================

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function toInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number(value);
}

function toFloat(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Drop undefined entries so the result is a valid StateMap. */
function compact(fields: Record<string, StateValue | undefined>): StateMap {
  const result: Record<string, StateValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

// ============================================================
// system
// ============================================================

/** /proc/meminfo → bytes. `memory_used` excludes reclaimable cache. */
export function parseMeminfo(output: string): StateMap {
  const kb: Record<string, number> = {};
  for (const line of lines(output)) {
    const match = /^(\w+):\s+(\d+)\s*kB$/.exec(line);
    if (match) kb[match[1]] = Number(match[2]);
  }
  const total = kb['MemTotal'];
  const available = kb['MemAvailable'] ?? kb['MemFree'];
  const free = kb['MemFree'];
  return compact({
    memory_total: total !== undefined ? total * 1024 : undefined,
    memory_free: free !== undefined ? free * 1024 : undefined,
    memory_available: available !== undefined ? available * 1024 : undefined,
    memory_used:
      total !== undefined && available !== undefined ? (total - available) * 1024 : undefined,
  });
}

/** `df -B1 /` → bytes for the root filesystem. */
export function parseDf(output: string): StateMap {
  const rows = lines(output);
  if (rows.length < 2) return {};
  const columns = rows[rows.length - 1].split(/\s+/);
  if (columns.length < 4) return {};
  return compact({
    disk_total: toInt(columns[1]),
    disk_used: toInt(columns[2]),
    disk_free: toInt(columns[3]),
  });
}

/** /proc/loadavg → [1m, 5m, 15m]. */
export function parseLoadavg(output: string): StateMap {
  const parts = output.trim().split(/\s+/).slice(0, 3).map(toFloat);
  if (parts.length !== 3 || parts.some((p) => p === undefined)) return {};
  return { load_average: parts.map((p) => p ?? 0) };
}

/** /proc/uptime → whole seconds. */
export function parseUptime(output: string): StateMap {
  const seconds = toFloat(output.trim().split(/\s+/)[0]);
  return seconds === undefined ? {} : { uptime: Math.floor(seconds) };
}

/**
 * Thermal zone reading in millidegrees (`48312`) or vcgencmd output
 * (`temp=48.3'C`) → degrees Celsius, one decimal.
 */
export function parseTemperature(output: string): StateMap {
  const text = output.trim();
  const vcgencmd = /^temp=([\d.]+)'C$/.exec(text);
  if (vcgencmd) {
    const celsius = toFloat(vcgencmd[1]);
    return celsius === undefined ? {} : { cpu_temperature: celsius };
  }
  const milli = toInt(text);
  return milli === undefined ? {} : { cpu_temperature: Math.round(milli / 100) / 10 };
}

// ============================================================
// hardware
// ============================================================

/** /proc/device-tree/model is NUL-terminated. */
export function parseModel(output: string): StateMap {
  const model = output.replace(/\0/g, '').trim();
  return model.length > 0 ? { model } : {};
}

// ============================================================
// network
// ============================================================

/**
 * `ip -o -4 addr show` → `{ interfaces: { eth0: { ipv4: ['192.168.1.20/24'] } } }`.
 * The loopback interface is skipped. Names that are not valid map keys
 * (`eth0.100`) are keyed as `eth0_100` and keep the real name in `device`.
 */
export function parseIpAddr(output: string): StateMap {
  const interfaces = new Map<string, string[]>();
  for (const line of lines(output)) {
    const match = /^\d+:\s+(\S+)\s+inet\s+(\S+)/.exec(line);
    if (!match) continue;
    const name = match[1].split('@')[0];
    if (name === 'lo') continue;
    const addresses = interfaces.get(name) ?? [];
    addresses.push(match[2]);
    interfaces.set(name, addresses);
  }
  const result: Record<string, StateValue> = {};
  for (const [name, addresses] of interfaces) {
    const key = toMapKey(name);
    result[key] = key === name ? { ipv4: addresses } : { device: name, ipv4: addresses };
  }
  return { interfaces: result };
}

// ============================================================
// software
// ============================================================

/** /etc/os-release → `{ id, version_id, pretty_name }`. */
export function parseOsRelease(output: string): StateMap {
  const fields: Record<string, string> = {};
  for (const line of lines(output)) {
    const match = /^([A-Z_]+)=(.*)$/.exec(line);
    if (match) fields[match[1]] = match[2].replace(/^"(.*)"$/, '$1');
  }
  return compact({
    id: fields['ID'],
    version_id: fields['VERSION_ID'],
    pretty_name: fields['PRETTY_NAME'],
  });
}

// ============================================================
// services
// ============================================================

/**
 * `systemctl list-units --type=service --state=running --no-legend --plain`
 * → sorted unit names without the `.service` suffix.
 */
export function parseRunningServices(output: string): StateMap {
  const running = lines(output)
    .map((line) => line.split(/\s+/)[0])
    .filter((unit) => unit.endsWith('.service'))
    .map((unit) => unit.slice(0, -'.service'.length))
    .sort();
  return { running };
}

// ============================================================
// gaming
// ============================================================

/** `ls -1` of the ROM root → sorted system directory names. */
export function parseRomSystems(output: string): StateMap {
  return { rom_systems: lines(output).sort() };
}

/** File extensions counted as ROMs (compared case-insensitively). */
export const ROM_EXTENSIONS = [
  'zip', '7z', 'rom', 'bin', 'iso', 'cue', 'chd',
  'nes', 'sfc', 'smc', 'gb', 'gbc', 'gba', 'md', 'n64', 'z64',
] as const;

/**
 * `find . -mindepth 2 -type f ...` run inside the ROM root → ROM files per
 * system. Every system in `systems` is reported, empty ones as 0.
 */
export function parseRomCounts(output: string, systems: readonly string[]): StateMap {
  const counts: Record<string, number> = {};
  for (const system of systems) {
    counts[toMapKey(system)] = 0;
  }
  for (const line of lines(output)) {
    const system = line.replace(/^\.\//, '').split('/')[0];
    if (system.length === 0) continue;
    const key = toMapKey(system);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return { rom_counts: counts };
}

/** Systems each emulator package serves; other packages serve the system they are named after. */
const EMULATOR_SYSTEMS = new Map<string, readonly string[]>([
  ['retroarch', ['arcade', 'nes', 'snes', 'genesis', 'psx', 'n64']],
  ['mupen64plus', ['n64']],
  ['pcsx-rearmed', ['psx']],
  ['ppsspp', ['psp']],
  ['reicast', ['dreamcast']],
  ['dolphin', ['gamecube', 'wii']],
  ['vice', ['c64']],
  ['dosbox', ['dos', 'pc']],
  ['scummvm', ['scummvm']],
  ['mame', ['arcade', 'mame']],
  ['fba', ['arcade', 'neogeo', 'cps']],
]);

/**
 * `ls -1` of the emulator install directory → installed packages and the
 * preferred emulator per system (first installed package, alphabetically).
 */
export function parseEmulators(output: string): StateMap {
  const installed = lines(output).sort();
  const preferred: Record<string, string> = {};
  for (const emulator of installed) {
    for (const system of EMULATOR_SYSTEMS.get(emulator) ?? [emulator]) {
      preferred[toMapKey(system)] ??= emulator;
    }
  }
  return { emulators: { installed, preferred } };
}

export type ControllerType = 'xbox' | 'ps5' | 'ps4' | 'nintendo_pro' | '8bitdo' | 'generic';

export function controllerType(name: string): ControllerType {
  const lower = name.toLowerCase();
  if (lower.includes('xbox') || lower.includes('x-box')) return 'xbox';
  if (lower.includes('ps5') || lower.includes('dualsense')) return 'ps5';
  if (
    lower.includes('playstation') ||
    lower.includes('ps4') ||
    lower.includes('dualshock') ||
    (lower.includes('sony') && lower.includes('wireless controller'))
  ) {
    return 'ps4';
  }
  if (lower.includes('nintendo') || lower.includes('switch pro')) return 'nintendo_pro';
  if (lower.includes('8bitdo')) return '8bitdo';
  return 'generic';
}

type Controller = {
  name: string;
  type: ControllerType;
  device: string;
  configured: boolean;
};

/**
 * /proc/bus/input/devices → joystick devices. A controller counts as
 * configured when `retroarchConfig` has an `input_device` line naming it.
 */
export function parseControllers(devices: string, retroarchConfig = ''): StateMap {
  const configuredNames = lines(retroarchConfig)
    .filter((line) => line.startsWith('input_device'))
    .map((line) => line.replace(/^input_device\w*\s*=\s*/, '').replace(/^"(.*)"$/, '$1'));

  const controllers: Controller[] = [];
  for (const block of devices.split(/\n\s*\n/)) {
    const name = /^N:\s*Name="([^"]*)"/m.exec(block)?.[1];
    const js = /^H:\s*Handlers=.*\b(js\d+)\b/m.exec(block)?.[1];
    if (name === undefined || js === undefined) continue;
    controllers.push({
      name,
      type: controllerType(name),
      device: `/dev/input/${js}`,
      configured: configuredNames.includes(name),
    });
  }
  controllers.sort((a, b) => a.device.localeCompare(b.device));
  return { controllers };
}
