export * from "./executor";
export * from "./file-enumerator";
export * from "./file-mover";
export * from "./operation-manager";
export * from "./operation-store";
export * from "./renamer-service";
export * from "./reservation-book";
export * from "./tag-reader";
export * from "./undo-manager";
export * from "./worker-pool";
