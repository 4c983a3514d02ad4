export { parseRecords, dumpRecord, dumpRecords } from './services/recordParser';
export { Origin, fileSource, callerSource, UNKNOWN_SOURCE } from './models/origin';
export type { TextSource, FileTextSource, UnknownTextSource, CallerTextSource } from './models/origin';
export { makeRecord, fieldOrigin, recordToObject } from './models/record';
export type { UnitRecord } from './models/record';
export { FILE_ROLES, isFileRole, unitIdentifier, unitPath, describeUnit, getRecordValue, getTranslatedRecordValue } from './models/unit';
export type { Unit, UnitKind, JobUnit, CategoryUnit, TestPlanUnit, FileUnit, FileRole, ProviderRef } from './models/unit';
export { UNIT_KINDS, DEFAULT_UNIT_KIND, buildUnit, isUnitKind, lookupUnitKind } from './units';
export type { UnitInit, UnitIssue, UnitLookup, IssueSeverity } from './units';
export { validateUnit, checkUnit, formatIssue, UnitCheckContext } from './services/validationService';
export type { ValidationOptions } from './services/validationService';
export { SelectionList } from './services/selectionList';
export { ContentClassifier, isWithin } from './services/classificationService';
export type { ClassificationResult, LoaderKind, ProviderDirectories } from './services/classificationService';
export { ContentEnumerator, StaticContentSource, contentDirectories } from './services/contentEnumerator';
export type { ContentEntry, ContentSource } from './services/contentEnumerator';
export { unitSourceLoader, selectionListLoader, plainContentLoader, runLoader, loadWith, DEFAULT_LOAD_OPTIONS } from './services/unitLoaders';
export type { ContentLoaderStrategy, ContentLoadOptions, LoadResult, LoaderProvider } from './services/unitLoaders';
export { ContentLoader, loaderOptionsFromConfig } from './services/contentLoader';
export type { ContentLoadSummary } from './services/contentLoader';
export { Provider, deriveDirectories } from './services/provider';
export type { ProviderInit, DeclaredDirectories, UnitsAndProblems } from './services/provider';
export { discoverProviders, loadProviderDefinition, parseProviderDefinition, providerFromDefinition, effectiveDirectories, isSecureDefinition, PROVIDER_DEFINITION_SUFFIX } from './services/providerDefinition';
export type { ProviderDiscovery } from './services/providerDefinition';
export type { ProviderDefinitionDoc } from './schemas';
export * from './services/errors';
export { getRuntimeConfig, reloadRuntimeConfig } from './config/runtimeConfig';
export type { RuntimeConfig, LogLevel } from './config/runtimeConfig';
