import type {
  EnumDeclaration,
  ImportDeclaration,
  ServiceDeclaration,
  SourceFile,
  StructDeclaration,
} from './nodes.js';

/**
 * Everything contributed to one package by every file declaring it
 */
export interface PackageTree {
  name: string;
  files: SourceFile[];
  structs: StructDeclaration[];
  enums: EnumDeclaration[];
  /** One entry per service FQN, reopened blocks already merged */
  services: ServiceDeclaration[];
  imports: ImportDeclaration[];
}

/**
 * Group files by package name. `services` replaces the per-file service
 * lists with the merged, program-wide view.
 */
export function groupByPackage(
  files: readonly SourceFile[],
  services: readonly ServiceDeclaration[]
): Map<string, PackageTree> {
  const packages = new Map<string, PackageTree>();
  const packageOfFile = new Map<number, string>();

  for (const file of files) {
    const name = file.package?.name ?? '';
    packageOfFile.set(file.id, name);

    let tree = packages.get(name);
    if (!tree) {
      tree = { name, files: [], structs: [], enums: [], services: [], imports: [] };
      packages.set(name, tree);
    }

    tree.files.push(file);
    tree.structs.push(...file.structs);
    tree.enums.push(...file.enums);
    tree.imports.push(...file.imports);
  }

  for (const service of services) {
    const tree = packages.get(packageOfFile.get(service.fileId) ?? '');
    tree?.services.push(service);
  }

  return packages;
}
