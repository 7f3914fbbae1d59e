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

import { Value } from "../image/Address.js";
import { Arena } from "../image/Arena.js";
import { Binary } from "../image/Binary.js";
import { Region } from "../image/Region.js";
import { Section } from "../image/Section.js";
import { InstructionSet } from "../isa/InstructionSet.js";
import { TargetName, Targets, TargetSpec } from "../isa/Targets.js";
import { Xmode } from "../isa/Xmode.js";
import { Parser } from "../parser/Parser.js";
import * as Nodes from "../parser/nodes/Node.js";
import { NodeType } from "../parser/nodes/Node.js";
import { CodeError } from "../utils/CodeError.js";
import { InternalError } from "../utils/InternalError.js";
import { numToHex, roundUp } from "../utils/Strings.js";
import { AssemblerError, ContainerAllocationError } from "./AssemblerError.js";
import { AssemblyResult, RegionInfo, SectionInfo } from "./AssemblyResult.js";
import { BaseMgr } from "./BaseMgr.js";
import { Context, PhaseName } from "./Context.js";
import { binariesOf, isLive, StatementRecord, StatementState } from "./Statement.js";
import { SymbolData, SymbolType } from "./SymbolData.js";
import { SymbolTable } from "./SymbolTable.js";
import { DataAssembler } from "./assemblers/DataAssembler.js";
import { InsnAssembler } from "./assemblers/InsnAssembler.js";
import { PswAssembler } from "./assemblers/PswAssembler.js";
import { SectionAssembler } from "./assemblers/SectionAssembler.js";
import { SymbolAssembler } from "./assemblers/SymbolAssembler.js";
import { UsingAssembler } from "./assemblers/UsingAssembler.js";
import { Deferred, ExprEvaluator } from "./util/ExprEvaluator.js";

export type TraceFunction = (line: string) => void;

export interface AssemblerOptions {
    target?: TargetName;            // s370 if not set
    addressWidth?: number;          // from the target if not set
    caseSensitive?: boolean;
    failFast?: boolean;             // rethrow the first statement error
    imageName?: string;             // IMAGE if not set
    xmode?: Xmode;                  // overrides the PSW and CCW formats of the target
    trace?: TraceFunction;
}

export interface ResolvedOptions {
    readonly target: TargetSpec;
    readonly addressWidth: number;
    readonly caseSensitive: boolean;
    readonly failFast: boolean;
    readonly imageName: string;
    readonly xmode: Readonly<Xmode>;
    readonly trace?: TraceFunction;
}

export const AddressWidths = [16, 24, 31, 64];

// regions without a start address follow their predecessor on this boundary
export const RegionAlignment = 8;

export function resolveOptions(options: AssemblerOptions): ResolvedOptions {
    const target = Targets[options.target ?? "s370"];
    const addressWidth = options.addressWidth ?? target.addressWidth;
    if (!AddressWidths.includes(addressWidth)) {
        throw Error(`Unsupported address width ${addressWidth}, expected one of ${AddressWidths.join(", ")}`);
    }

    return Object.freeze({
        target: target,
        addressWidth: addressWidth,
        caseSensitive: options.caseSensitive ?? false,
        failFast: options.failFast ?? false,
        imageName: options.imageName ?? "IMAGE",
        xmode: { ...target.xmode, ...options.xmode },
        trace: options.trace,
    });
}

export interface SubComponents {
    target: TargetSpec;
    symbols: SymbolTable;
    evaluator: ExprEvaluator;
    arena: Arena;
    instructions: InstructionSet;
}

/**
 * Runs all statements through the phases parse, early-resolve, early-resolve-retry,
 * allocate, bind, object-generate, consolidate and finish.
 */
export class Assembler {
    private opts: ResolvedOptions;
    private instructions: InstructionSet;
    private operandFree: ReadonlySet<string>;
    private syms: SymbolTable;
    private arena: Arena;
    private evaluator: ExprEvaluator;

    private sectionAsm: SectionAssembler;
    private symbolAsm: SymbolAssembler;
    private usingAsm: UsingAssembler;
    private dataAsm: DataAssembler;
    private insnAsm: InsnAssembler;
    private pswAsm: PswAssembler;

    private programs: Nodes.Program[] = [];
    private records: StatementRecord[] = [];
    private assembled = false;

    public constructor(options: AssemblerOptions = {}, instructions = new InstructionSet()) {
        this.opts = resolveOptions(options);
        this.instructions = instructions;
        this.operandFree = instructions.operandFreeMnemonics();
        this.syms = new SymbolTable(this.opts.caseSensitive);
        this.arena = new Arena(this.opts.imageName);
        this.evaluator = new ExprEvaluator(this.syms, this.arena);

        const components: SubComponents = {
            target: this.opts.target,
            symbols: this.syms,
            evaluator: this.evaluator,
            arena: this.arena,
            instructions: this.instructions,
        };

        this.sectionAsm = new SectionAssembler(components);
        this.symbolAsm = new SymbolAssembler(components);
        this.usingAsm = new UsingAssembler(components);
        this.dataAsm = new DataAssembler(components, this.sectionAsm, this.symbolAsm);
        this.insnAsm = new InsnAssembler(components, this.sectionAsm, this.symbolAsm);
        this.pswAsm = new PswAssembler(components, this.sectionAsm, this.symbolAsm);
    }

    public getOptions(): ResolvedOptions {
        return this.opts;
    }

    public parseInput(name: string, input: string): Nodes.Program {
        const parser = new Parser({ operandFreeMnemonics: this.operandFree }, name, input);
        const prog = parser.parseProgram();
        this.programs.push(prog);
        return prog;
    }

    public getSymbols(): ReadonlyMap<string, SymbolData> {
        return this.syms.getSymbols();
    }

    public assembleAll(): AssemblyResult {
        if (this.assembled) {
            throw Error("Assembler can only run once");
        }
        this.assembled = true;

        // protect against being called with parse errors present
        const parseErrors = this.programs.map(p => p.errors).flat();
        if (parseErrors.length > 0) {
            if (this.opts.failFast) {
                throw parseErrors[0];
            }
            return this.emptyResult(parseErrors);
        }

        const ctx = new Context(this.arena, new BaseMgr(this.opts.target.directRegisters), this.opts.xmode);
        this.parsePhase(ctx);
        this.earlyResolvePhase(ctx, "early-resolve");
        this.earlyResolvePhase(ctx, "early-resolve-retry");
        this.allocatePhase(ctx);
        this.bindPhase(ctx);
        this.objectGeneratePhase(ctx);
        this.consolidatePhase(ctx);
        return this.finishPhase(ctx);
    }

    private parsePhase(ctx: Context) {
        this.beginPhase(ctx, "parse");
        // L and M follow at bind, until then L'IMAGE and M'IMAGE are deferred
        this.syms.define(this.arena.image.name, { type: SymbolType.Image }, { S: 0, I: 0, T: "I" }, 0);

        let stmtNo = 0;
        for (const prog of this.programs) {
            for (const node of prog.stmts) {
                const rec: StatementRecord = {
                    stmtNo: ++stmtNo,
                    node: node,
                    state: StatementState.Parsed,
                    ignore: ctx.ended,
                    pending: false,
                    items: [],
                };
                this.records.push(rec);
                if (rec.ignore) {
                    continue;
                }

                this.guarded(ctx, rec, () => this.parseStatement(ctx, rec));
                if (node.type == NodeType.End) {
                    ctx.ended = true;
                }
            }
        }
        this.trace(ctx, `${stmtNo} statements in ${this.programs.length} inputs`);
    }

    private parseStatement(ctx: Context, rec: StatementRecord) {
        const node = rec.node;
        switch (node.type) {
            case NodeType.Comment:
            case NodeType.ListingControl:
                rec.ignore = true;
                break;
            case NodeType.Start:
                this.sectionAsm.parseStart(ctx, rec, node);
                break;
            case NodeType.Region:
                this.sectionAsm.parseRegion(ctx, rec, node);
                break;
            case NodeType.Csect:
            case NodeType.Dsect:
                this.sectionAsm.parseSection(ctx, rec, node);
                break;
            case NodeType.Org:
            case NodeType.Using:
            case NodeType.Drop:
            case NodeType.Entry:
            case NodeType.End:
                this.placeMarker(ctx, rec, true);
                break;
            case NodeType.Equ:
                this.symbolAsm.defineEquate(rec, node);
                this.placeMarker(ctx, rec, false);
                break;
            case NodeType.DefineConstant:
            case NodeType.DefineStorage:
                this.dataAsm.parse(ctx, rec, node);
                break;
            case NodeType.Instruction:
                this.insnAsm.parseInstruction(ctx, rec, node);
                break;
            case NodeType.Ccw:
                this.insnAsm.parseCcw(ctx, rec, node);
                break;
            case NodeType.Psw:
                this.pswAsm.parsePsw(ctx, rec, node);
                break;
            case NodeType.Xmode:
                this.pswAsm.handleXmode(ctx, node);
                rec.ignore = true;
                break;
        }
    }

    // zero-length content so that * and labels are defined at directives
    private placeMarker(ctx: Context, rec: StatementRecord, withLabel: boolean) {
        const binary = this.arena.newBinary(1, 0);
        rec.binary = binary;
        this.sectionAsm.place(ctx, rec, binary);
        if (withLabel) {
            this.symbolAsm.defineLabel(rec, binary, 1);
        }
    }

    private earlyResolvePhase(ctx: Context, phase: PhaseName) {
        this.beginPhase(ctx, phase);
        const retry = phase == "early-resolve-retry";
        let deferredCount = 0;

        for (const rec of this.records) {
            if (!isLive(rec) || (retry && !rec.pending)) {
                continue;
            }

            this.guarded(ctx, rec, () => {
                const res = this.earlyResolve(ctx, rec);
                rec.pending = res !== undefined;
                rec.state = StatementState.EarlyResolved;
                if (res) {
                    deferredCount++;
                    this.trace(ctx, `statement ${rec.stmtNo} deferred: ${res.reason}`);
                }
            });
        }
        this.trace(ctx, `${deferredCount} statements deferred`);
    }

    private earlyResolve(ctx: Context, rec: StatementRecord): Deferred | undefined {
        const node = rec.node;
        switch (node.type) {
            case NodeType.Start:
            case NodeType.Region:
                return this.sectionAsm.resolveRegionStart(ctx, rec, node.address);
            case NodeType.Equ:
                return this.symbolAsm.resolveEqu(ctx, rec, node);
            case NodeType.DefineConstant:
            case NodeType.DefineStorage:
                return this.dataAsm.resolveLengths(ctx, rec);
            case NodeType.Instruction:
            case NodeType.Ccw:
                return this.insnAsm.resolveOperands(ctx, rec, node);
            case NodeType.Psw:
                return this.pswAsm.resolveOperands(ctx, rec, node);
            case NodeType.Comment:
            case NodeType.Xmode:
            case NodeType.ListingControl:
            case NodeType.Csect:
            case NodeType.Dsect:
            case NodeType.Org:
            case NodeType.Using:
            case NodeType.Drop:
            case NodeType.Entry:
            case NodeType.End:
                return undefined;
        }
    }

    private allocatePhase(ctx: Context) {
        this.beginPhase(ctx, "allocate");

        for (const rec of this.records) {
            if (rec.ignore) {
                continue;
            }

            const binaries = binariesOf(rec);
            const section = binaries.length > 0 ? this.arena.sectionOf(binaries[0]) : undefined;
            if (section?.failed) {
                // reported at the statement that broke the section
                rec.state = StatementState.Errored;
                continue;
            } else if (rec.state == StatementState.Errored) {
                // failed statements keep their space so that later addresses stay correct
                this.allocateBinaries(ctx, binaries);
                continue;
            }

            try {
                this.allocateStatement(ctx, rec, binaries, section);
                rec.state = StatementState.Allocated;
            } catch (e) {
                if (e instanceof ContainerAllocationError && section) {
                    section.failed = true;
                }
                this.recordError(ctx, rec, e, true);
            }
        }

        this.resolveLeftovers(ctx);

        for (const section of this.arena.allSections()) {
            section.freeze();
            this.trace(ctx, `${section.describe()}: ${section.length} bytes${section.failed ? ", failed" : ""}`);
        }
    }

    private allocateStatement(ctx: Context, rec: StatementRecord, binaries: Binary[], section: Section | undefined) {
        const node = rec.node;
        switch (node.type) {
            case NodeType.DefineConstant:
            case NodeType.DefineStorage:
                if (rec.pending) {
                    const res = this.dataAsm.resolveLengths(ctx, rec);
                    if (res) {
                        throw new ContainerAllocationError(`Length unknown: ${res.reason}`, node, section?.describe() ?? "section");
                    }
                    rec.pending = false;
                }
                this.allocateBinaries(ctx, binaries);
                break;
            case NodeType.Org:
                this.allocateBinaries(ctx, binaries);
                if (section) {
                    this.sectionAsm.allocateOrg(ctx, rec, node, section);
                }
                break;
            case NodeType.Start:
            case NodeType.Region:
            case NodeType.Equ:
                this.allocateBinaries(ctx, binaries);
                if (rec.pending) {
                    rec.pending = this.earlyResolve(ctx, rec) !== undefined;
                }
                break;
            case NodeType.Comment:
            case NodeType.ListingControl:
            case NodeType.Csect:
            case NodeType.Dsect:
            case NodeType.Using:
            case NodeType.Drop:
            case NodeType.Entry:
            case NodeType.End:
            case NodeType.Instruction:
            case NodeType.Ccw:
            case NodeType.Psw:
            case NodeType.Xmode:
                this.allocateBinaries(ctx, binaries);
                break;
        }
    }

    private allocateBinaries(ctx: Context, binaries: Binary[]) {
        binaries.forEach((binary, i) => {
            const section = this.arena.sectionOf(binary);
            if (!section) {
                throw new InternalError(`Binary ${binary.id} is not in a section`);
            }

            // the length of a failed statement might never have been computed
            if (!binary.hasLength()) {
                binary.setLength(0);
            }
            section.assign(binary);
            if (i == 0 && binary.loc) {
                ctx.location.establish(binary.loc);
            }
        });
    }

    // equates and region starts that referred to later statements
    private resolveLeftovers(ctx: Context) {
        for (const rec of this.records) {
            if (!isLive(rec) || !rec.pending) {
                continue;
            }

            this.guarded(ctx, rec, () => {
                this.establishAt(ctx, rec);
                const res = this.earlyResolve(ctx, rec);
                rec.pending = res !== undefined;
                if (res && (rec.node.type == NodeType.Start || rec.node.type == NodeType.Region)) {
                    throw new AssemblerError(`Region start unknown: ${res.reason}`, rec.node);
                }
            });
        }
    }

    private bindPhase(ctx: Context) {
        this.beginPhase(ctx, "bind");

        let next = 0;
        for (const region of this.arena.allRegions()) {
            const start = region.requestedStart ?? roundUp(next, RegionAlignment);
            region.position(start);
            region.assignAll();
            region.freeze();
            region.bindAll();
            next = region.end;
            this.trace(ctx, `${region.describe()} at ${numToHex(start, 6)}, ${region.length} bytes`);
            this.checkAddressWidth(ctx, region);
        }

        this.arena.image.locateAll();
        this.updateAttributes();
        this.resolveEquates(ctx);

        for (const rec of this.records) {
            if (isLive(rec)) {
                rec.state = StatementState.Bound;
            }
        }
    }

    private checkAddressWidth(ctx: Context, region: Region) {
        const limit = 2 ** this.opts.addressWidth;
        const origin = ctx.regionOrigins.get(region.id);
        if (region.end <= limit || !origin) {
            return;
        }

        const msg = `${region.describe()} ends at ${numToHex(region.end, 6)}, beyond the ${this.opts.addressWidth}-bit address space`;
        this.recordError(ctx, origin, new AssemblerError(msg, origin.node), false);
    }

    // L and M of everything that got its final position
    private updateAttributes() {
        for (const sym of this.syms.getSymbols().values()) {
            const val = sym.value;
            switch (val.type) {
                case SymbolType.Section: {
                    const section = this.arena.section(val.sectionId);
                    sym.attributes.L = section.length;
                    if (!section.dummy) {
                        sym.attributes.M = section.imageOffset;
                    }
                    break;
                }
                case SymbolType.Region: {
                    const region = this.arena.region(val.regionId);
                    sym.attributes.L = region.length;
                    sym.attributes.M = region.imageOffset;
                    break;
                }
                case SymbolType.Label: {
                    const binary = this.arena.binary(val.binaryId);
                    const section = this.arena.sectionOf(binary);
                    if (!section || section.dummy || section.imageOffset === undefined) {
                        break;
                    } else if (binary.loc?.kind == "absolute" && section.loc.kind == "absolute") {
                        sym.attributes.M = section.imageOffset + binary.loc.value - section.loc.value;
                    }
                    break;
                }
                case SymbolType.Image:
                    sym.attributes.L = this.arena.image.length;
                    sym.attributes.M = 0;
                    break;
                case SymbolType.Equate:
                    break;
            }
        }
    }

    // equates may depend on each other, so retry as long as something changes
    private resolveEquates(ctx: Context) {
        const equates = this.records.filter(rec => isLive(rec) && rec.node.type == NodeType.Equ);

        let progress = true;
        while (progress) {
            progress = false;
            for (const rec of equates) {
                if (!isLive(rec) || !rec.pending || rec.node.type != NodeType.Equ) {
                    continue;
                }
                const node = rec.node;
                this.guarded(ctx, rec, () => {
                    this.establishAt(ctx, rec);
                    if (!this.symbolAsm.resolveEqu(ctx, rec, node)) {
                        rec.pending = false;
                        progress = true;
                    }
                });
            }
        }

        for (const rec of equates) {
            if (!isLive(rec) || rec.node.type != NodeType.Equ) {
                continue;
            }
            const node = rec.node;
            this.guarded(ctx, rec, () => {
                if (rec.pending) {
                    this.establishAt(ctx, rec);
                    const res = this.symbolAsm.resolveEqu(ctx, rec, node);
                    throw new AssemblerError(`Can't resolve ${node.label?.name}: ${res?.reason ?? "circular definition"}`, node);
                }
                this.symbolAsm.bindEqu(node);
            });
        }
    }

    private objectGeneratePhase(ctx: Context) {
        this.beginPhase(ctx, "object-generate");
        for (const rec of this.records) {
            if (!isLive(rec)) {
                continue;
            }

            this.guarded(ctx, rec, () => {
                this.establishAt(ctx, rec);
                this.generate(ctx, rec);
                rec.state = StatementState.ObjectGenerated;
            });
        }
    }

    private generate(ctx: Context, rec: StatementRecord) {
        const node = rec.node;
        switch (node.type) {
            case NodeType.Comment:
            case NodeType.ListingControl:
            case NodeType.Start:
            case NodeType.Region:
            case NodeType.Csect:
            case NodeType.Dsect:
            case NodeType.Org:
            case NodeType.Equ:
            case NodeType.Xmode:
                break;
            case NodeType.Using:
                this.usingAsm.handleUsing(ctx, rec, node);
                break;
            case NodeType.Drop:
                this.usingAsm.handleDrop(ctx, rec, node);
                break;
            case NodeType.Entry:
                this.symbolAsm.handleEntry(ctx, rec, node);
                break;
            case NodeType.End:
                this.symbolAsm.handleEnd(ctx, rec, node);
                break;
            case NodeType.DefineConstant:
            case NodeType.DefineStorage:
                this.dataAsm.generate(ctx, rec, node);
                break;
            case NodeType.Instruction:
                this.insnAsm.generateInstruction(ctx, rec, node, this.contentOf(rec));
                break;
            case NodeType.Ccw:
                this.insnAsm.generateCcw(ctx, rec, node, this.contentOf(rec));
                break;
            case NodeType.Psw:
                this.pswAsm.generatePsw(ctx, rec, node, this.contentOf(rec));
                break;
        }
    }

    private consolidatePhase(ctx: Context) {
        this.beginPhase(ctx, "consolidate");
        const bytes = this.arena.image.insert();
        for (const rec of this.records) {
            if (isLive(rec)) {
                rec.state = StatementState.Consolidated;
            }
        }
        this.trace(ctx, `image ${this.arena.image.name}: ${bytes.length} bytes`);
    }

    private finishPhase(ctx: Context): AssemblyResult {
        this.beginPhase(ctx, "finish");
        const regions = this.arena.allRegions();
        const load = ctx.loadRegion?.start ?? regions[0]?.start ?? 0;
        const entry = ctx.entry?.address ?? load;
        this.trace(ctx, `load ${numToHex(load, 6)}, entry ${numToHex(entry, 6)}, ${ctx.errors.length} errors`);

        return {
            imageName: this.arena.image.name,
            image: this.arena.image.getBytes() ?? new Uint8Array(0),
            load: load,
            entry: entry,
            regions: regions.map(r => this.regionInfo(r)),
            dsects: this.arena.allSections().filter(s => s.dummy).map(s => this.sectionInfo(s)),
            errors: [...ctx.errors].sort((a, b) => (a.stmtNo ?? 0) - (b.stmtNo ?? 0)),
            symbols: this.syms.getSymbols(),
            symbolValues: this.symbolValues(),
            statements: this.records,
        };
    }

    // final value of every symbol that has one
    private symbolValues(): Map<string, Value> {
        const res = new Map<string, Value>();
        for (const sym of this.syms.getSymbols().values()) {
            const val = sym.value;
            let value: Value | undefined;
            switch (val.type) {
                case SymbolType.Section:    value = this.arena.section(val.sectionId).loc; break;
                case SymbolType.Region:     value = this.arena.region(val.regionId).loc; break;
                case SymbolType.Image:      value = 0; break;
                case SymbolType.Label:      value = this.arena.binary(val.binaryId).loc; break;
                case SymbolType.Equate:     value = val.value; break;
            }
            if (value !== undefined) {
                res.set(sym.name, value);
            }
        }
        return res;
    }

    private regionInfo(region: Region): RegionInfo {
        return {
            name: region.name,
            start: region.start,
            length: region.length,
            imageOffset: region.imageOffset ?? 0,
            sections: region.children().map(s => this.sectionInfo(s)),
            bytes: region.getBytes() ?? new Uint8Array(region.length),
        };
    }

    private sectionInfo(section: Section): SectionInfo {
        return {
            name: section.name,
            dummy: section.dummy,
            failed: section.failed,
            length: section.length,
            address: section.loc.kind == "absolute" ? section.loc.value : undefined,
            imageOffset: section.imageOffset,
        };
    }

    private emptyResult(errors: CodeError[]): AssemblyResult {
        return {
            imageName: this.opts.imageName,
            image: new Uint8Array(0),
            load: 0,
            entry: 0,
            regions: [],
            dsects: [],
            errors: errors,
            symbols: this.syms.getSymbols(),
            symbolValues: new Map(),
            statements: [],
        };
    }

    private contentOf(rec: StatementRecord): Binary {
        if (!rec.binary) {
            throw new InternalError(`Statement ${rec.stmtNo} has no content`);
        }
        return rec.binary;
    }

    // * is the location of the statement's first content
    private establishAt(ctx: Context, rec: StatementRecord) {
        ctx.location.reset();
        const first = binariesOf(rec)[0];
        if (first?.loc) {
            ctx.location.establish(first.loc);
        }
    }

    private guarded(ctx: Context, rec: StatementRecord, action: () => void) {
        try {
            action();
        } catch (e) {
            this.recordError(ctx, rec, e, true);
        }
    }

    /**
     * Collect a statement error. Invariant violations are never collected
     * and failFast rethrows the first error.
     */
    private recordError(ctx: Context, rec: StatementRecord, e: unknown, markErrored: boolean) {
        if (e instanceof InternalError || !(e instanceof Error)) {
            throw e;
        }

        const err = e instanceof AssemblerError ? e : new AssemblerError(e.message, rec.node);
        err.stmtNo = rec.stmtNo;
        if (markErrored) {
            rec.state = StatementState.Errored;
            rec.error = err;
        }
        ctx.errors.push(err);
        this.trace(ctx, `statement ${rec.stmtNo} failed: ${err.message}`);

        if (this.opts.failFast) {
            throw err;
        }
    }

    private beginPhase(ctx: Context, phase: PhaseName) {
        ctx.startPhase(phase);
        this.trace(ctx, "begin");
    }

    private trace(ctx: Context, msg: string) {
        this.opts.trace?.(`[${ctx.phase}] ${msg}`);
    }
}
