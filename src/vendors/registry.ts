// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import registry from './vendors.json';

export interface RegisteredVendor {
    id: string;
    name: string;
}

/** TCG TPM Vendor ID Registry. */
const VENDORS: ReadonlyMap<string, RegisteredVendor> = new Map(
    registry.map((vendor): [string, RegisteredVendor] => [vendor.id, { id: vendor.id, name: vendor.name }])
);

export function isValidVendorId(id: string): boolean {
    return VENDORS.has(id);
}

export function validateVendorId(id: string): void {
    if (!isValidVendorId(id)) {
        throw new Error(`invalid vendor ID "${id}": not found in TCG TPM Vendor ID Registry`);
    }
}

export function getVendorName(id: string): string | undefined {
    return VENDORS.get(id)?.name;
}

export function listVendors(): RegisteredVendor[] {
    return [...VENDORS.values()];
}
