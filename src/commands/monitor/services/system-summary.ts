import si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';
import type { DiskUsage, SystemSummary } from '../types.js';

export interface SystemReadings {
  cpuCount: number;
  cpuLoadPercent: number;
  totalMemory: number;
  availableMemory: number;
  uptimeSeconds: number;
  disks: ReadonlyArray<Pick<Systeminformation.FsSizeData, 'mount' | 'size' | 'used' | 'use'>>;
  temperature: number | null;
}

/** Host-wide CPU, memory, disk, temperature and uptime for the header. */
export async function readSystemSummary(platform: NodeJS.Platform = process.platform): Promise<SystemSummary> {
  const [load, mem, time, disks, temperature] = await Promise.all([
    si.currentLoad(),
    si.mem(),
    si.time(),
    si.fsSize(),
    si.cpuTemperature()
  ]);

  return toSystemSummary({
    cpuCount: load.cpus.length,
    cpuLoadPercent: load.currentLoad,
    totalMemory: mem.total,
    availableMemory: mem.available,
    uptimeSeconds: time.uptime,
    disks,
    temperature: temperature.main
  }, platform);
}

export function toSystemSummary(readings: SystemReadings, platform: NodeJS.Platform = process.platform): SystemSummary {
  const { totalMemory } = readings;
  const usedMemory = Math.max(0, totalMemory - readings.availableMemory);

  return {
    cpuCount: readings.cpuCount,
    cpuLoadPercent: readings.cpuLoadPercent,
    totalMemory,
    usedMemory,
    memoryPercent: totalMemory > 0 ? (usedMemory / totalMemory) * 100 : 0,
    uptimeSeconds: readings.uptimeSeconds,
    disk: systemDisk(readings.disks, platform),
    // Hosts without a sensor report null or -1
    temperature: readings.temperature !== null && readings.temperature > 0 ? readings.temperature : null
  };
}

function systemDisk(disks: SystemReadings['disks'], platform: NodeJS.Platform): DiskUsage | null {
  const mount = platform === 'win32' ? (process.env.SYSTEMDRIVE ?? 'C:') : '/';
  const disk = disks.find(candidate => candidate.mount.toUpperCase() === mount.toUpperCase());
  if (!disk) return null;
  return { mount: disk.mount, usedBytes: disk.used, sizeBytes: disk.size, percent: disk.use };
}
