/**
 * switch 的 default 分支里调用：联合类型新增成员而漏处理时，这里会编译报错。
 */
export function assert_never(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
