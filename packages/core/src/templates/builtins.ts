import { DocumentTemplate } from './document-template.js';
import { ApprovalWorkflow, DocumentStyle, Margins, Section } from './entities.js';

export const SERVICE_CONTRACT = 'service_contract';
export const CONSULTING_CONTRACT = 'consulting_contract';

/**
 * Master template for a service agreement
 *
 * @param revisedAt - Stamped into the `UltimaRevisao` metadata entry
 */
export function buildServiceContractTemplate(revisedAt: Date = new Date()): DocumentTemplate {
  return new DocumentTemplate({
    title: 'Contrato de Prestação de Serviços',
    category: 'Contratos',
    style: new DocumentStyle({
      fontFamily: 'Arial',
      fontSize: 12,
      headerColor: '#003366',
      logoUrl: 'https://company.com/logo.png',
      pageMargins: new Margins({ top: 2, bottom: 2, left: 3, right: 3 }),
    }),
    workflow: new ApprovalWorkflow({
      approvers: ['gerente@empresa.com', 'juridico@empresa.com'],
      requiredApprovals: 2,
      timeoutDays: 5,
    }),
    sections: [
      new Section({
        name: 'Cláusula 1 - Objeto',
        content: 'O presente contrato tem por objeto...',
        isEditable: true,
      }),
      new Section({
        name: 'Cláusula 2 - Prazo',
        content: 'O prazo de vigência será de...',
        isEditable: true,
      }),
      new Section({
        name: 'Cláusula 3 - Valor',
        content: 'O valor total do contrato é de...',
        isEditable: true,
      }),
    ],
    requiredFields: ['NomeCliente', 'CPF', 'Endereco'],
    tags: ['contrato', 'servicos'],
    metadata: new Map([
      ['Versao', '1.0'],
      ['Departamento', 'Comercial'],
      ['UltimaRevisao', revisedAt.toISOString()],
    ]),
  });
}

/**
 * Turn a copy of the service contract into a consulting contract, in place
 */
export function customizeConsultingContract(template: DocumentTemplate): void {
  template.title = 'Contrato de Consultoria';
  template.tags.push('consultoria');

  const [objectClause] = template.sections;
  if (objectClause) {
    objectClause.content = 'O presente contrato de consultoria tem por objeto...';
  }
}
