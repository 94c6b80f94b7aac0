export { assert, describe, test } from "./nodeTest.js";
export {
  createFakeChild,
  createFakeChildren,
  type FakeChild,
  type FakeChildOptions,
} from "./fakeChildren.js";
