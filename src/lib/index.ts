/**
 * EndDevice registration client
 *
 * @license Apache-2.0
 */

export * from './errors';
export * from './logger';
export * from './config';
export * from './identity/deviceIdentity';
export * from './model/types';
export * from './model/resources';
export * from './model/documentCodec';
export * from './model/endDeviceParsing';
export * from './model/deviceSpec';
export * from './transport/Transport';
export * from './transport/CredentialProvider';
export * from './transport/HttpTransport';
export * from './transport/RecordingTransport';
export * from './transport/createTransport';
export * from './registration/types';
export * from './registration/RegistrationOrchestrator';
export * from './client/EndDeviceClient';
export * from './ledger/RegistrationLedger';
export * from './ledger/FileRegistrationLedger';
export * from './ledger/PostgresRegistrationLedger';
export * from './ledger/createRegistrationLedger';
export * from './application/RegistrationService';
export * from './factory/createRegistrationService';
