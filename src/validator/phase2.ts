import { ResolutionError, type IdlError } from '../errors/index.js';
import { describeType, isUserType, unwrapStreaming } from '../ast/types.js';
import type { ProgramIndex, SymbolResolver } from '../resolver/index.js';
import type {
  MethodDeclaration,
  SourceFile,
  StructDeclaration,
  TypeExpr,
} from '../ast/nodes.js';

/**
 * Phase 2: bind every field and method signature type. Method parameters
 * and return values must name structs, optionally streamed.
 */
export function runPhase2(index: ProgramIndex, resolver: SymbolResolver): IdlError[] {
  const errors: IdlError[] = [];

  const checkStruct = (struct: StructDeclaration, file: SourceFile): void => {
    const scope = { file, containerId: struct.id };
    for (const field of struct.fields) {
      const members = field.type === 'PlainField' ? [field] : field.members;
      for (const member of members) {
        errors.push(...resolver.resolveType(member.valueType, scope));
      }
    }
    for (const nested of struct.structs) checkStruct(nested, file);
  };

  const checkSignatureType = (
    type: TypeExpr,
    method: MethodDeclaration,
    what: string,
    file: SourceFile
  ): void => {
    const failures = resolver.resolveType(type, { file });
    if (failures.length > 0) {
      errors.push(...failures);
      return;
    }

    const target = unwrapStreaming(type);
    let found: string | undefined;
    if (!isUserType(target)) {
      found = `'${describeType(target)}'`;
    } else {
      const resolution = resolver.table.get(target.id);
      if (resolution?.kind === 'enum') found = `enum '${resolution.fqn}'`;
    }

    if (found !== undefined) {
      errors.push(
        new ResolutionError(
          `Method '${method.name}' ${what} must be a struct, found ${found}`,
          target.position,
          index.contextOf(file),
          describeType(target)
        )
      );
    }
  };

  for (const file of index.files) {
    for (const struct of file.structs) checkStruct(struct, file);

    for (const service of file.services) {
      for (const method of service.methods) {
        for (const param of method.params) checkSignatureType(param.valueType, method, 'parameter', file);
        for (const ret of method.returns) checkSignatureType(ret.valueType, method, 'return value', file);
      }
    }
  }

  return errors;
}
