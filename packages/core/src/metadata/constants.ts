export const INJECTABLE_METADATA = "wirebox:injectable";
export const INJECT_METADATA = "wirebox:inject";
export const OVERLOAD_METADATA = "wirebox:overload";
