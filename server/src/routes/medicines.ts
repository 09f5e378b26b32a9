import { Router } from "express";
import { toEntry, type Catalog } from "../catalog";
import { NotFoundError } from "../errors";

export const medicinesRouter = (catalog: Catalog): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(catalog.records.map(toEntry));
  });

  router.get("/search", (req, res) => {
    const query = typeof req.query.query === "string" ? req.query.query : "";
    res.json(catalog.searchByName(query).map(toEntry));
  });

  router.get("/groups", (_req, res) => {
    res.json({ groups: catalog.distinctGroups() });
  });

  router.get("/companies", (_req, res) => {
    res.json({ companies: catalog.distinctCompanies() });
  });

  router.get("/by-group/:group", (req, res) => {
    res.json(catalog.filterByGroup(req.params.group));
  });

  router.get("/by-company/:company", (req, res) => {
    res.json(catalog.filterByCompany(req.params.company));
  });

  router.get("/:id", (req, res) => {
    const medicine = catalog.findById(req.params.id);
    if (!medicine) {
      throw new NotFoundError("Medicine", req.params.id);
    }
    res.json(medicine);
  });

  return router;
};
