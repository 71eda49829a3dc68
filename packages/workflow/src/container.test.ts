import { describe, it, expect } from 'vitest';
import { Establishment } from '@vistoria/domain/establishment';
import { InspectionStatus } from '@vistoria/domain/inspection';
import { User } from '@vistoria/domain/user';
import { loadWorkflowConfig } from './config.js';
import { createWorkflow } from './container.js';
import { createInMemoryRepositories } from './repositories.js';

describe('createWorkflow', () => {
  it('refuses an invalid configuration', () => {
    expect(() =>
      createWorkflow({
        repos: createInMemoryRepositories(),
        config: loadWorkflowConfig({ MAX_UPLOAD_BYTES: '0' }),
      })
    ).toThrow('Invalid configuration:\n- MAX_UPLOAD_BYTES must be a positive integer');
  });

  it('runs an upload from company setup to approval over shared repositories', async () => {
    const repos = createInMemoryRepositories();
    const workflow = createWorkflow({
      repos,
      config: loadWorkflowConfig({ LOG_LEVEL: 'error' }),
    });
    const admin = User.createAdmin({ email: 'admin@example.com', name: 'Admin' });

    const company = await workflow.admin.createCompany(admin, { name: 'Rede Sabor' });
    const manager = await workflow.admin.createManager(admin, {
      name: 'Gestor',
      email: 'gestor@example.com',
      companyId: company.id,
    });
    const establishment = Establishment.create({ name: 'Loja Centro', companyId: company.id });
    await repos.establishments.save(establishment);

    const inspection = await workflow.ingestion.ingest({
      content: new TextEncoder().encode('%PDF-1.4\nrelatorio'),
      filename: 'relatorio.pdf',
      establishmentId: establishment.id,
    });
    await workflow.ingestion.recordAnalysis(inspection.id, {
      items: [{ problem: 'Ralo sem tela', action: 'Instalar tela' }],
    });
    const result = await workflow.plans.approvePlan(inspection.id, manager);

    expect(result.inspection.status).toBe(InspectionStatus.PENDING_CONSULTANT_VERIFICATION);
    expect(result.plan.approvedById).toBe(manager.id);
  });
});
