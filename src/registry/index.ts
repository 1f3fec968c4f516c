export {
  TemplateRegistry,
  TEMPLATE_DEFINITIONS,
  buildTemplate,
  type Template,
  type TemplateDefinition,
  type FormatInfo,
} from "./registry.js";
