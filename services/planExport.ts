import { writeFileSync } from 'node:fs';
import * as XLSX from 'xlsx';
import { VlsmPlan } from '../types.js';

export const PLAN_SHEET_NAME = 'VLSM Plan';

export const planFileName = (plan: VlsmPlan): string => `VLSM_Plan_${plan.baseNetwork.replace(/[./]/g, '_')}.xlsx`;

export const buildPlanWorkbook = (plan: VlsmPlan): XLSX.WorkBook => {
  const workbook = XLSX.utils.book_new();

  const summaryData: (string | number)[][] = [
    ['VLSM Calculation Summary', ''],
    ['Base Network', plan.baseNetwork],
    ['Total Addresses', plan.totalAddresses],
    ['Total Required Hosts', plan.totalRequiredHosts],
    ['Total Allocated Hosts', plan.totalAllocatedHosts],
    ['Address Utilization Efficiency', `${plan.efficiency.toFixed(2)}%`],
  ];
  const worksheet = XLSX.utils.aoa_to_sheet(summaryData);

  const subnetTableData: (string | number)[][] = [
    ['#', 'Required Hosts', 'Usable Hosts', 'Network Address', 'Subnet Mask', 'CIDR', 'First Usable', 'Last Usable', 'Broadcast Address'],
  ];
  plan.allocations.forEach((subnet) => {
    subnetTableData.push([
      subnet.index,
      subnet.requestedHosts,
      subnet.totalHosts,
      subnet.network,
      subnet.mask,
      `/${subnet.prefix}`,
      subnet.firstUsable ?? 'N/A',
      subnet.lastUsable ?? 'N/A',
      subnet.broadcast,
    ]);
  });

  XLSX.utils.sheet_add_aoa(worksheet, [['Allocated Subnets']], { origin: 'A8' });
  XLSX.utils.sheet_add_aoa(worksheet, subnetTableData, { origin: 'A9' });

  worksheet['!cols'] = [
    { wch: 30 }, { wch: 15 }, { wch: 15 }, { wch: 20 }, { wch: 20 },
    { wch: 8 }, { wch: 18 }, { wch: 18 }, { wch: 20 },
  ];
  worksheet['!merges'] = [
    { s: { r: 0, c: 0 }, e: { r: 0, c: 1 } },
    { s: { r: 7, c: 0 }, e: { r: 7, c: 8 } },
  ];

  XLSX.utils.book_append_sheet(workbook, worksheet, PLAN_SHEET_NAME);
  return workbook;
};

/** Writes the plan as an .xlsx workbook and returns the path written. */
export const exportPlan = (plan: VlsmPlan, path: string = planFileName(plan)): string => {
  const data: Buffer = XLSX.write(buildPlanWorkbook(plan), { type: 'buffer', bookType: 'xlsx' });
  writeFileSync(path, data);
  return path;
};
