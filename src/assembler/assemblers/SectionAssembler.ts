/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { isAddress } from "../../image/Address.js";
import { Arena } from "../../image/Arena.js";
import { Binary } from "../../image/Binary.js";
import { Region } from "../../image/Region.js";
import { Section } from "../../image/Section.js";
import * as Nodes from "../../parser/nodes/Node.js";
import { NodeType } from "../../parser/nodes/Node.js";
import { SubComponents } from "../Assembler.js";
import { AssemblerError, ContainerAllocationError } from "../AssemblerError.js";
import { Context } from "../Context.js";
import { StatementRecord } from "../Statement.js";
import { SymbolType } from "../SymbolData.js";
import { SymbolTable, SymbolTableError } from "../SymbolTable.js";
import { Deferred, ExprEvaluator, isDeferred } from "../util/ExprEvaluator.js";

/**
 * Assembler for statements that open regions and sections or move inside them.
 */
export class SectionAssembler {
    private arena: Arena;
    private syms: SymbolTable;
    private evaluator: ExprEvaluator;

    public constructor(components: SubComponents) {
        this.arena = components.arena;
        this.syms = components.symbols;
        this.evaluator = components.evaluator;
    }

    public parseStart(ctx: Context, rec: StatementRecord, stmt: Nodes.StartStatement) {
        if (stmt.address || stmt.region) {
            this.openRegion(ctx, rec, stmt.region?.name ?? "");
        }

        const section = this.openSection(ctx, rec, stmt.label?.name ?? "", false);
        if (!ctx.loadRegion && section.owner !== undefined) {
            ctx.loadRegion = this.arena.region(section.owner);
        }
    }

    public parseRegion(ctx: Context, rec: StatementRecord, stmt: Nodes.RegionStatement) {
        if (!stmt.label) {
            throw new AssemblerError("REGION needs a label", stmt);
        }
        this.openRegion(ctx, rec, stmt.label.name);
    }

    public parseSection(ctx: Context, rec: StatementRecord, stmt: Nodes.CsectStatement | Nodes.DsectStatement) {
        const dummy = stmt.type == NodeType.Dsect;
        if (dummy && !stmt.label) {
            throw new AssemblerError("DSECT needs a label", stmt);
        }
        this.openSection(ctx, rec, stmt.label?.name ?? "", dummy);
    }

    /**
     * Append content to the current section. The first content without an
     * explicit section gets the unnamed control section.
     */
    public place(ctx: Context, rec: StatementRecord, binary: Binary) {
        let section = ctx.currentSection;
        if (!section) {
            if (ctx.unnamedSection) {
                throw new AssemblerError("No active section, use CSECT", rec.node);
            }
            section = this.openSection(ctx, rec, "", false);
        }
        section.append(binary);
    }

    // start address of a region opened by START or REGION
    public resolveRegionStart(ctx: Context, rec: StatementRecord, address: Nodes.Expression | undefined): Deferred | undefined {
        if (!address || !rec.region) {
            return undefined;
        }

        const val = this.evaluator.tryEval(ctx, address, rec.stmtNo);
        if (isDeferred(val)) {
            return val;
        }

        let start: number;
        if (!isAddress(val)) {
            start = val;
        } else if (val.kind == "absolute") {
            start = val.value;
        } else {
            throw new AssemblerError("Region start must be an absolute address", address);
        }

        if (start < 0) {
            throw new AssemblerError(`Invalid region start ${start}`, address);
        }
        rec.region.requestedStart = start;
        return undefined;
    }

    // called after the ORG marker got its location
    public allocateOrg(ctx: Context, rec: StatementRecord, stmt: Nodes.OrgStatement, section: Section) {
        if (!stmt.target) {
            section.orgHighWater();
            return;
        }

        const val = this.evaluator.tryEval(ctx, stmt.target, rec.stmtNo);
        if (isDeferred(val)) {
            throw new ContainerAllocationError(`ORG target unknown: ${val.reason}`, stmt.target, section.describe());
        } else if (!isAddress(val) || val.kind != "relative" || val.sectionId != section.id) {
            throw new ContainerAllocationError("ORG target must be in the current section", stmt.target, section.describe());
        }
        section.org(val.offset);
    }

    private openRegion(ctx: Context, rec: StatementRecord, name: string): Region {
        let region: Region;
        if (!name) {
            if (ctx.unnamedRegion) {
                throw new AssemblerError("Only one unnamed region allowed", rec.node);
            }
            region = this.arena.newRegion("");
            ctx.unnamedRegion = region;
        } else {
            const existing = this.syms.tryLookup(name);
            if (existing?.value.type == SymbolType.Region) {
                region = this.arena.region(existing.value.regionId);
            } else if (existing) {
                throw SymbolTableError.redefined(existing);
            } else {
                region = this.arena.newRegion(this.syms.normalize(name));
                this.syms.define(name, { type: SymbolType.Region, regionId: region.id }, { S: 0, I: 0, T: "R" }, rec.stmtNo);
            }
        }

        if (!ctx.regionOrigins.has(region.id)) {
            ctx.regionOrigins.set(region.id, rec);
        }
        ctx.currentRegion = region;
        ctx.currentSection = undefined;
        rec.region = region;
        return region;
    }

    private openSection(ctx: Context, rec: StatementRecord, name: string, dummy: boolean): Section {
        const existing = name ? this.syms.tryLookup(name) : undefined;
        let section: Section;
        if (!name && ctx.unnamedSection) {
            section = ctx.unnamedSection;
        } else if (existing?.value.type == SymbolType.Section && this.arena.section(existing.value.sectionId).dummy == dummy) {
            section = this.arena.section(existing.value.sectionId);
        } else if (existing) {
            throw SymbolTableError.redefined(existing);
        } else {
            section = this.arena.newSection(name ? this.syms.normalize(name) : "", dummy);
            if (name) {
                const type = dummy ? "D" : "C";
                this.syms.define(name, { type: SymbolType.Section, sectionId: section.id }, { S: 0, I: 0, T: type }, rec.stmtNo);
            } else {
                ctx.unnamedSection = section;
            }

            if (!dummy) {
                const region = ctx.currentRegion ?? this.openRegion(ctx, rec, "");
                region.append(section);
            }
        }

        // resuming a control section also resumes its region
        if (section.owner !== undefined) {
            ctx.currentRegion = this.arena.region(section.owner);
        }
        ctx.currentSection = section;
        rec.section = section;
        return section;
    }
}
