export type { IdAllocator } from "./id-allocator";
export { SequentialIdAllocator } from "./id-allocator";
export type { SidebarDirectives } from "./objective-update";
export { ObjectiveUpdateType } from "./objective-update";
export type { SidebarConfig, SidebarReconcilerConfig, SidebarRenderResult } from "./sidebar-reconciler";
export { SidebarReconciler, SIDEBAR_DISPLAY_LIMIT, compareForDisplay } from "./sidebar-reconciler";
