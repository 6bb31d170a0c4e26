/** 字段声明名 → 序列化名 */
export type NamingPolicy = (name: string) => string;

function is_upper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

/**
 * 首字母小写；开头连续的大写缩写整体小写，但保留下一个单词的首字母。
 *
 * 示例：
 *   camel_case("Value")    => "value"
 *   camel_case("URLValue") => "urlValue"
 *   camel_case("ID")       => "id"
 */
export const camel_case: NamingPolicy = (name) => {
  if (!name || !is_upper(name[0])) return name;

  const chars = [...name];
  for (let i = 0; i < chars.length; i++) {
    if (i === 1 && !is_upper(chars[i])) break;

    const has_next = i + 1 < chars.length;
    if (i > 0 && has_next && !is_upper(chars[i + 1])) {
      // "ABC DEF" 这类带空格的情况，整段缩写都小写
      if (chars[i + 1] === " ") chars[i] = chars[i].toLowerCase();
      break;
    }
    chars[i] = chars[i].toLowerCase();
  }
  return chars.join("");
};

// 缩写 | 普通单词 | 纯数字；数字跟随前一个单词
const WORD = /[A-Z]+(?![a-z])\d*|[A-Z]?[a-z]+\d*|\d+/g;

function split_words(name: string): string[] {
  return name.match(WORD) ?? [];
}

function separated(separator: string, upper: boolean): NamingPolicy {
  return (name) => {
    const joined = split_words(name).join(separator);
    return upper ? joined.toUpperCase() : joined.toLowerCase();
  };
}

/** "NestedValue" => "nested_value" */
export const snake_case_lower: NamingPolicy = separated("_", false);
/** "NestedValue" => "NESTED_VALUE" */
export const snake_case_upper: NamingPolicy = separated("_", true);
/** "NestedValue" => "nested-value" */
export const kebab_case_lower: NamingPolicy = separated("-", false);
/** "NestedValue" => "NESTED-VALUE" */
export const kebab_case_upper: NamingPolicy = separated("-", true);

export const NamingPolicies = {
  camel_case,
  snake_case_lower,
  snake_case_upper,
  kebab_case_lower,
  kebab_case_upper,
} as const;
