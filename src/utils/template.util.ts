/**
 * Variables available to connection secret templates.
 */
export type TemplateVariables = Readonly<Record<string, string>>;

// Names exclude `$`, `{` and `}`.
const PLACEHOLDER_PATTERN = /\$\{([^${}]*)\}/g;

/**
 * `${name}` substitution for connection secret templates.
 *
 * Templates come from trusted service configuration, so placeholders
 * without a matching variable are left in place rather than rejected.
 */
export class TemplateUtil {
  /**
   * @example
   * ```typescript
   * TemplateUtil.render('redis://:${password}@${instanceName}:6379', {
   *   password: 'p1',
   *   instanceName: 'my-redis',
   * }); // 'redis://:p1@my-redis:6379'
   * ```
   */
  static render(template: string, variables: TemplateVariables): string {
    return template.replace(PLACEHOLDER_PATTERN, (placeholder, name: string) =>
      Object.prototype.hasOwnProperty.call(variables, name)
        ? variables[name]
        : placeholder,
    );
  }

  /**
   * Names referenced by the template, in order of first appearance.
   */
  static placeholders(template: string): string[] {
    const names: string[] = [];
    for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
      if (!names.includes(match[1])) {
        names.push(match[1]);
      }
    }
    return names;
  }

  /**
   * Whether the template consists of exactly one placeholder for `name`.
   */
  static isPlaceholderFor(template: string, name: string): boolean {
    return template === `\${${name}}`;
  }
}
