/**
 * Doctor and Patient Storage
 *
 * Both may belong to a department; neither takes part in cascades.
 */

import type { Doctor, CreateDoctorInput, UpdateDoctorInput } from "../types/doctor.js";
import type { Patient, CreatePatientInput, UpdatePatientInput } from "../types/patient.js";
import { ForeignKeyError } from "./errors.js";
import type { Repository } from "./repository.js";
import type { Tables } from "./tables.js";

export interface DoctorsRepository extends Repository<Doctor, CreateDoctorInput> {
  doctorsByDepartment(departmentId: string): Doctor[];
}

export interface PatientsRepository extends Repository<Patient, CreatePatientInput> {
  patientsByDepartment(departmentId: string): Patient[];
}

function departmentChecker(tables: Tables) {
  return (departmentId: string | undefined) => {
    if (departmentId && !tables.departments.exists(departmentId)) {
      throw new ForeignKeyError("department_id", departmentId);
    }
  };
}

export function createDoctorsRepository(tables: Tables): DoctorsRepository {
  const base = tables.doctors;
  const checkDepartment = departmentChecker(tables);

  return {
    ...base,

    create(input: CreateDoctorInput): Doctor {
      checkDepartment(input.department_id);
      return base.create(input);
    },

    update(id: string, patch: UpdateDoctorInput): Doctor {
      checkDepartment(patch.department_id);
      return base.update(id, patch);
    },

    doctorsByDepartment(departmentId: string): Doctor[] {
      return base.query().where("department_id", departmentId).toArray();
    },
  };
}

export function createPatientsRepository(tables: Tables): PatientsRepository {
  const base = tables.patients;
  const checkDepartment = departmentChecker(tables);

  return {
    ...base,

    create(input: CreatePatientInput): Patient {
      checkDepartment(input.department_id);
      return base.create(input);
    },

    update(id: string, patch: UpdatePatientInput): Patient {
      checkDepartment(patch.department_id);
      return base.update(id, patch);
    },

    patientsByDepartment(departmentId: string): Patient[] {
      return base.query().where("department_id", departmentId).toArray();
    },
  };
}
