// Deterministic record keys. Every key derives from hierarchy coordinates
// only, so a re-run addresses the same records.

import type { DeviceRole } from '../types';

export const podKey = (dcKey: string, podIndex: number) => `${dcKey}/pod${podIndex}`;

export const rowKey = (pod: string, rowIndex: number) => `${pod}/row${rowIndex}`;

export const rackKey = (row: string, rackIndex: number) => `${row}/rack${rackIndex}`;

export const deviceKey = (scope: string, role: DeviceRole, index: number) => `${scope}/${role}${index}`;

export const interfaceKey = (device: string, interfaceName: string) => `${device}/${interfaceName}`;

export const cableKey = (bottomInterface: string, topInterface: string) => `${bottomInterface}--${topInterface}`;

export const poolKey = (scope: string, role: string) => `${scope}/${role}-pool`;

export const nameClaimKey = (dcKey: string, deviceName: string) => `${dcKey}/${deviceName}`;
