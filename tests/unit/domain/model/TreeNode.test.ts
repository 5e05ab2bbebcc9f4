import { TreeNode } from "../../../../src/domain/model/TreeNode";

describe("TreeNode", () => {
  test("should become a directory when a child is added", () => {
    const parent = new TreeNode("lib");
    const child = parent.addChild(new TreeNode("index.ts"));

    expect(parent.isLeaf).toBe(false);
    expect(child.parent).toBe(parent);
    expect(child.getPath()).toBe("lib/index.ts");
  });

  test("ensureChild should reuse an existing child and merge the mention", () => {
    const root = new TreeNode("app", false);
    const first = root.ensureChild("config", true);
    const second = root.ensureChild("config", false, "settings");

    expect(second).toBe(first);
    expect(root.children).toHaveLength(1);
    expect(first.isLeaf).toBe(false);
    expect(first.comment).toBe("settings");
  });

  test("merge should never turn a directory back into a leaf", () => {
    const node = new TreeNode("src", false, "sources");

    node.merge(true, "other");

    expect(node.isLeaf).toBe(false);
    expect(node.comment).toBe("sources");
  });
});
