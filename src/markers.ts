// src/markers.ts — Marker declarations injected into every analyzed program
// Users import the markers from "enumgen"; the ambient module below is what
// the checker resolves those imports to, so no runtime dependency is needed.

export const MARKER_MODULE = "enumgen";
export const MARKER_FILE_NAME = "__enumgen_markers.d.ts";

/** Option keys read from `@EnumExtensions({...})`. */
export const OPTION_EXTENSION_CLASS_NAME = "extensionClassName";
export const OPTION_EXTENSION_CLASS_NAMESPACE = "extensionClassNamespace";

export const MARKER_SOURCE = `// <auto-generated by enumgen />
declare module "${MARKER_MODULE}" {
  export interface EnumExtensionsOptions {
    /** Name of the generated helper object. Defaults to \`<Enum>Extensions\`. */
    ${OPTION_EXTENSION_CLASS_NAME}?: string;
    /** Namespace the helper object is emitted into. Defaults to the enum's namespace. */
    ${OPTION_EXTENSION_CLASS_NAMESPACE}?: string;
  }

  /** Requests generated helpers for the decorated enum. */
  export function EnumExtensions(options?: EnumExtensionsOptions): (target: object) => void;

  /** Marks an enum whose values combine as independent bits. */
  export const Flags: (target: object) => void;
}
`;

export type MarkerKind = "enumExtensions" | "flags";

/**
 * Fully-qualified checker names of the recognized markers.
 * Matched by value, never by declaration identity.
 */
export const MarkerIdentity = {
  enumExtensions: `"${MARKER_MODULE}".EnumExtensions`,
  flags: `"${MARKER_MODULE}".Flags`,
} as const satisfies Record<MarkerKind, string>;

export function identifyMarker(qualifiedName: string | undefined): MarkerKind | undefined {
  if (qualifiedName === MarkerIdentity.enumExtensions) return "enumExtensions";
  if (qualifiedName === MarkerIdentity.flags) return "flags";
  return undefined;
}
