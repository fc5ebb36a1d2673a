/**
 * MCP Tools Module
 *
 * Form tools exposed via MCP protocol.
 */

export {
  initializeFormTools,
  listForms,
  describeForm,
  validateForm,
  submitForm,
  ListFormsInputSchema,
  DescribeFormInputSchema,
  ValidateFormInputSchema,
  SubmitFormInputSchema,
} from './form-tools.js';
