/**
 * @fileoverview Plugin loader barrel exports
 *
 * @module @mockpilot/engine/plugins
 */

export {
    PluginLoader,
    type LoadedPlugins,
    type PluginLoaderConfig,
} from "./PluginLoader.js";
