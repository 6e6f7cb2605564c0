import { z } from "zod";
import { readDataFile } from "../utils/data-file";

/**
 * Curated value pools for realistic demographics, read from
 * data/demographics/*.json on first use.
 */

const localitySchema = z.object({
  city: z.string(),
  state: z.string(),
  postalCode: z.string(),
  areaCode: z.string(),
});

const organizationSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export type Locality = z.infer<typeof localitySchema>;
export type Organization = z.infer<typeof organizationSchema>;

export type DemographicPools = {
  firstNames: string[];
  lastNames: string[];
  streets: string[];
  localities: Locality[];
  organizations: Organization[];
};

const names = z.array(z.string().min(1)).min(1);

let cachedPools: DemographicPools | null = null;

export function demographicPools(): DemographicPools {
  if (cachedPools !== null) {
    return cachedPools;
  }

  cachedPools = {
    firstNames: readDataFile("demographics/first-names.json", names),
    lastNames: readDataFile("demographics/last-names.json", names),
    streets: readDataFile("demographics/streets.json", names),
    localities: readDataFile("demographics/localities.json", z.array(localitySchema).min(1)),
    organizations: readDataFile("demographics/organizations.json", z.array(organizationSchema).min(1)),
  };
  return cachedPools;
}
