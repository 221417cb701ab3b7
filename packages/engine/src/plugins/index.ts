/**
 * @fileoverview Plugin loader barrel exports
 *
 * @module @switchyard/engine/plugins
 */

export {
    PluginLoader,
    createNodeFromYaml,
    isYamlReplyDefinition,
    validateYamlReply,
    type YamlMatchDefinition,
    type YamlReplyDefinition,
    type YamlPluginFile,
    type PluginLoaderConfig,
} from "./PluginLoader.js";
