export { createMemoryMarkerStore, createFileMarkerStore } from "./marker-store.js";
