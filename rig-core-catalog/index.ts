export { default as parseInstructionCatalog, InstructionCatalog } from './instruction-catalog';
export {
  default as TemplateInstructionDescriptor,
  CatalogEntry,
  CatalogOperand,
  renderCatalogOperand,
} from './template-instruction-descriptor';
