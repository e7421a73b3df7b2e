// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

export {
    getTrustedBundle,
    verifyTrustedBundle,
    loadTrustedBundle,
    saveTrustedBundle,
    GetConfig,
    VerifyConfig,
    LoadConfig,
    SaveConfig,
    SaveResult,
    VerificationOptions,
} from './api';
export { TrustedBundle, TrustedBundleOptions } from './trusted-bundle';
export { BundleAssets, parseProvenance } from './assets';
export { BundleMetadata } from '../bundle/metadata';
export { BundleValidationError, assertValidBundle, validateBundle } from '../bundle/validator';
export { BundleType } from '../bundle/constants';
export { AutoUpdateConfig, CacheConfig } from '../cache/cache';
export { Environment, EnvConfigParser } from '../config/env-config';
export { Repo, DEFAULT_SOURCE_REPO } from '../github/types';
export { AcceptanceMode, PolicyConfig } from '../transparency/policy';
export { SignatureVerifier, VerifiedSignature } from '../transparency/signature';
export { AttestationOutcome, VerifyResult } from '../transparency/verifier';
export { CertificateInfo } from '../x509/certificate';
export { ErrorKind, TpmtbError, isErrorKind } from '../utils/errors';
