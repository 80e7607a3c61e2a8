import { Injectable } from '@nestjs/common';

export type CompanyRecord = {
  name: string;
  registrationNumber: string;
};

const COMPANIES: CompanyRecord[] = [
  { name: 'Harbour Lights Bakery', registrationNumber: 'HL204411' },
  { name: 'Harbour View Logistics', registrationNumber: 'HV880213' },
  { name: 'Northwind Joinery', registrationNumber: 'NW551902' },
  { name: 'Northgate Dental', registrationNumber: 'NG100377' },
  { name: 'Quillfeather Press', registrationNumber: 'QF009124' },
  { name: 'Saltmarsh Cycles', registrationNumber: 'SM770045' },
];

@Injectable()
export class CompanyDirectoryService {
  private readonly companies: readonly CompanyRecord[] = COMPANIES;

  search(query: string, limit = 5): CompanyRecord[] {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }
    return this.companies.filter((company) => company.name.toLowerCase().startsWith(needle)).slice(0, limit);
  }
}
