import type { PrimitiveName } from '../config/constants.js';

/**
 * Program-unique identity of a declaration or type reference. Parent links
 * are stored as ids rather than object references.
 */
export type NodeId = number;

export interface Position {
  line: number;
  column: number;
}

// ============================================
// Type expressions
// ============================================

// string, int32, timestamp, ...
export interface PrimitiveType {
  kind: 'primitive';
  name: PrimitiveName;
  position: Position;
}

// array<T>
export interface ArrayType {
  kind: 'array';
  element: TypeExpr;
  position: Position;
}

// map<K, V>
export interface MapType {
  kind: 'map';
  key: TypeExpr;
  value: TypeExpr;
  position: Position;
}

// optional<T>
export interface OptionalType {
  kind: 'optional';
  inner: TypeExpr;
  position: Position;
}

// stream T, only as a method parameter or return value
export interface StreamingType {
  kind: 'streaming';
  inner: TypeExpr;
  position: Position;
}

// User, resolved against the enclosing scopes
export interface SimpleUserType {
  kind: 'simpleUser';
  id: NodeId;
  name: string;
  position: Position;
}

// geo.Point, Outer.Inner, org.example.geo.Point
export interface QualifiedUserType {
  kind: 'qualifiedUser';
  id: NodeId;
  name: string;
  components: string[];
  position: Position;
}

export type UserTypeRef = SimpleUserType | QualifiedUserType;

export type TypeExpr =
  | PrimitiveType
  | ArrayType
  | MapType
  | OptionalType
  | StreamingType
  | SimpleUserType
  | QualifiedUserType;

// ============================================
// Declarations
// ============================================

// @deprecated, @since("1.2"), @max(10, 0x20)
export interface Annotation {
  name: string;
  arguments: Array<string | number>;
  position: Position;
}

interface Documented {
  annotations: Annotation[];
  /** Comment lines directly above the declaration, without the leading '#' */
  comments: string[];
}

// package org.example.geo;
export interface PackageDeclaration {
  type: 'Package';
  name: string;
  components: string[];
  position: Position;
}

// import "common/types" as types;
export interface ImportDeclaration {
  type: 'Import';
  id: NodeId;
  path: string;
  alias?: string;
  aliasPosition?: Position;
  position: Position;
}

// name string = 1;
export interface PlainField extends Documented {
  type: 'PlainField';
  id: NodeId;
  name: string;
  valueType: TypeExpr;
  index: number;
  position: Position;
  /** Enclosing struct */
  parentId: NodeId;
}

// union contact { email string = 2; phone string = 3; }
export interface UnionField extends Documented {
  type: 'UnionField';
  id: NodeId;
  name: string;
  members: PlainField[];
  position: Position;
  parentId: NodeId;
}

export type Field = PlainField | UnionField;

export interface StructDeclaration extends Documented {
  type: 'Struct';
  id: NodeId;
  name: string;
  fields: Field[];
  structs: StructDeclaration[];
  enums: EnumDeclaration[];
  position: Position;
  /** Enclosing struct, absent for top-level structs */
  parentId?: NodeId;
  fileId: NodeId;
}

// ACTIVE = 1;
export interface EnumOption extends Documented {
  type: 'EnumOption';
  name: string;
  value: number;
  position: Position;
}

export interface EnumDeclaration extends Documented {
  type: 'Enum';
  id: NodeId;
  name: string;
  options: EnumOption[];
  position: Position;
  parentId?: NodeId;
  fileId: NodeId;
}

// user User, stream Event, or a bare Request
export interface MethodParam {
  name?: string;
  valueType: TypeExpr;
  position: Position;
}

export interface MethodReturn {
  valueType: TypeExpr;
  position: Position;
}

export interface MethodDeclaration extends Documented {
  type: 'Method';
  id: NodeId;
  name: string;
  params: MethodParam[];
  returns: MethodReturn[];
  position: Position;
  serviceId: NodeId;
  /** Position of the `service` block this method was written in */
  blockPosition: Position;
}

export interface ServiceDeclaration extends Documented {
  type: 'Service';
  id: NodeId;
  name: string;
  methods: MethodDeclaration[];
  position: Position;
  /** Every `service Name { ... }` block merged into this declaration */
  blocks: Position[];
  fileId: NodeId;
}

export type Declaration = StructDeclaration | EnumDeclaration | ServiceDeclaration;

export interface SourceFile {
  type: 'File';
  id: NodeId;
  path: string;
  package?: PackageDeclaration;
  imports: ImportDeclaration[];
  structs: StructDeclaration[];
  enums: EnumDeclaration[];
  services: ServiceDeclaration[];
}
