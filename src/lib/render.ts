// render.ts - Re-exports from render/ modules
//   - render/components.ts - Reusable UI components
//   - render/pages.ts - Full page templates

export { profileDetail, profileEdit, profileEditForm, profileList } from "./render/pages.ts";
