// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

/**
 * The parts of an in-toto v1 SLSA provenance statement that verification
 * reads. Everything else in the payload is ignored.
 */
export interface ProvenanceStatement {
    type: string;
    predicateType: string;
    subjects: Array<{ name: string; sha256?: string }>;
    workflow?: { repository?: string; path?: string; ref?: string };
    gitCommit?: string;
    builderId?: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, ...path: Array<string | number>): unknown {
    let current = value;
    for (const key of path) {
        if (typeof key === 'number') {
            if (!Array.isArray(current)) return undefined;
            current = current[key];
        } else {
            if (!isObject(current)) return undefined;
            current = current[key];
        }
    }
    return current;
}

function stringField(value: unknown, ...path: Array<string | number>): string | undefined {
    const found = field(value, ...path);
    return typeof found === 'string' ? found : undefined;
}

export function decodeStatement(payload: Uint8Array | string): ProvenanceStatement {
    const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new Error('failed to decode attestation statement', { cause: error });
    }
    if (!isObject(raw)) {
        throw new Error('failed to decode attestation statement: expected a JSON object');
    }

    const subjects = Array.isArray(raw.subject)
        ? raw.subject.map(subject => ({
              name: stringField(subject, 'name') ?? '',
              sha256: stringField(subject, 'digest', 'sha256'),
          }))
        : [];

    const parameters = field(raw, 'predicate', 'buildDefinition', 'externalParameters', 'workflow');
    return {
        type: stringField(raw, '_type') ?? '',
        predicateType: stringField(raw, 'predicateType') ?? '',
        subjects,
        workflow: isObject(parameters)
            ? {
                  repository: stringField(parameters, 'repository'),
                  path: stringField(parameters, 'path'),
                  ref: stringField(parameters, 'ref'),
              }
            : undefined,
        gitCommit: stringField(raw, 'predicate', 'buildDefinition', 'resolvedDependencies', 0, 'digest', 'gitCommit'),
        builderId: stringField(raw, 'predicate', 'runDetails', 'builder', 'id'),
    };
}
