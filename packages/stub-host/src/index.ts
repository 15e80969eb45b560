export {
  DEFAULT_DATABASE_PATH,
  findType,
  loadStubDatabase,
  parseStubDatabase,
} from "./database.js";
export type {
  StubConstantMember,
  StubConstantValue,
  StubDatabase,
  StubFunctionMember,
  StubMember,
  StubModule,
  StubModuleMember,
  StubMultipleMember,
  StubPropertyMember,
  StubTypeMember,
} from "./database.js";
export { StubInterpreter, createStubInterpreter } from "./interpreter.js";
