/**
 * Derive the API name of a model from its class name.
 *
 * An underscore goes before every uppercase letter except the first
 * character, then everything is lowercased:
 * `MinecraftVersion` -> `minecraft_version`, `Profile` -> `profile`.
 */
export function toApiName(typeName: string): string {
  return typeName.replace(/(?<=.)([A-Z])/g, '_$1').toLowerCase();
}
