/**
 * Operation Registry
 * @module services/operation-registry
 *
 * Lookup over the operation catalogue: scopes, operations, folders and
 * file names. Unknown names fail with UnknownOperationError.
 */

import { ALL_SCOPES, type Scope, isScope } from '../types/entities.js';
import { UnknownOperationError } from '../errors/index.js';
import { type Result, ok, err, isErr, map } from '../utils/result.js';
import { type FetcherName, type ScopeDefinition, USE_CASES } from './use-cases.js';

// ============================================================================
// Types
// ============================================================================

export interface OperationDescriptor {
  readonly scope: Scope;
  readonly name: string;
  readonly folder: string;
  readonly fileName: string;
  readonly groupingKey?: string;
  readonly productType?: string;
  readonly fetcher: FetcherName;
}

export interface ScopeDescriptor {
  readonly scope: Scope;
  readonly folder: string;
  readonly operations: OperationDescriptor[];
}

export interface IOperationRegistry {
  listScopes(): ScopeDescriptor[];
  getOperations(scope: string): Result<OperationDescriptor[], UnknownOperationError>;
  getOperation(scope: string, name: string): Result<OperationDescriptor, UnknownOperationError>;
  getScopeFolderName(scope: string): Result<string, UnknownOperationError>;
  getOperationFolderName(scope: string, name: string): Result<string, UnknownOperationError>;
  getOperationFileName(scope: string, name: string): Result<string, UnknownOperationError>;
  getOperationProductType(scope: string, name: string): Result<string | undefined, UnknownOperationError>;
}

// ============================================================================
// Implementation
// ============================================================================

export class OperationRegistry implements IOperationRegistry {
  constructor(private readonly useCases: Readonly<Record<Scope, ScopeDefinition>> = USE_CASES) {}

  listScopes(): ScopeDescriptor[] {
    return ALL_SCOPES.map((scope) => ({
      scope,
      folder: this.useCases[scope].folder,
      operations: this.describeAll(scope),
    }));
  }

  getOperations(scope: string): Result<OperationDescriptor[], UnknownOperationError> {
    if (!isScope(scope)) {
      return err(new UnknownOperationError(scope));
    }
    return ok(this.describeAll(scope));
  }

  getOperation(scope: string, name: string): Result<OperationDescriptor, UnknownOperationError> {
    if (!isScope(scope)) {
      return err(new UnknownOperationError(scope));
    }

    const operations = this.useCases[scope].operations;
    const definition = Object.hasOwn(operations, name) ? operations[name] : undefined;
    if (!definition) {
      return err(new UnknownOperationError(scope, name));
    }

    return ok({
      scope,
      name,
      folder: definition.folder,
      fileName: definition.fileName,
      groupingKey: definition.groupingKey,
      productType: definition.productType,
      fetcher: definition.fetcher,
    });
  }

  getScopeFolderName(scope: string): Result<string, UnknownOperationError> {
    return isScope(scope) ? ok(this.useCases[scope].folder) : err(new UnknownOperationError(scope));
  }

  getOperationFolderName(scope: string, name: string): Result<string, UnknownOperationError> {
    return map(this.getOperation(scope, name), (operation) => operation.folder);
  }

  getOperationFileName(scope: string, name: string): Result<string, UnknownOperationError> {
    return map(this.getOperation(scope, name), (operation) => operation.fileName);
  }

  getOperationProductType(scope: string, name: string): Result<string | undefined, UnknownOperationError> {
    return map(this.getOperation(scope, name), (operation) => operation.productType);
  }

  private describeAll(scope: Scope): OperationDescriptor[] {
    const descriptors: OperationDescriptor[] = [];
    for (const name of Object.keys(this.useCases[scope].operations)) {
      const descriptor = this.getOperation(scope, name);
      if (!isErr(descriptor)) {
        descriptors.push(descriptor.value);
      }
    }
    return descriptors;
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createOperationRegistry(
  useCases?: Readonly<Record<Scope, ScopeDefinition>>
): IOperationRegistry {
  return new OperationRegistry(useCases);
}
