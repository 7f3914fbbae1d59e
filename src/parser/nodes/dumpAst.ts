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

import { replaceNonPrints } from "../../utils/Strings.js";
import * as Nodes from "./Node.js";
import { NodeType } from "./Node.js";

export function dumpAst(prog: Nodes.Program, write: (line: string) => void) {
    write(`Program("${prog.inputName}"`);
    for (const stmt of prog.stmts) {
        const label = stmt.label ? `${formatNode(stmt.label)}: ` : "";
        write(`  ${label}${formatNode(stmt)}`);
    }
    write(")");
}

function formatOpt(node: Nodes.Node | undefined): string {
    return node ? formatNode(node) : "";
}

function formatList(nodes: Nodes.Node[]): string {
    return nodes.map(n => formatNode(n)).join(", ");
}

// eslint-disable-next-line max-lines-per-function
export function formatNode(node: Nodes.Node): string {
    switch (node.type) {
        case NodeType.Program:
            return `Program("${node.inputName}")`;
        case NodeType.Comment:
            return `Comment("${replaceNonPrints(node.source)}")`;
        case NodeType.ListingControl:
            return `Listing(${node.operation})`;
        case NodeType.Start:
            return `Start(${formatOpt(node.address)}, ${formatOpt(node.region)})`;
        case NodeType.Region:
            return `Region(${formatOpt(node.address)})`;
        case NodeType.Csect:
            return "Csect()";
        case NodeType.Dsect:
            return "Dsect()";
        case NodeType.Org:
            return `Org(${formatOpt(node.target)})`;
        case NodeType.Using:
            return `Using(${formatNode(node.anchor)}, [${formatList(node.registers)}])`;
        case NodeType.Drop:
            return `Drop([${formatList(node.registers)}])`;
        case NodeType.Equ:
            return `Equ(${formatNode(node.value)}, ${formatOpt(node.length)})`;
        case NodeType.Entry:
            return `Entry(${formatNode(node.target)})`;
        case NodeType.End:
            return `End(${formatOpt(node.target)})`;
        case NodeType.DefineConstant:
            return `DC([${formatList(node.operands)}])`;
        case NodeType.DefineStorage:
            return `DS([${formatList(node.operands)}])`;
        case NodeType.Instruction:
            return `Insn(${node.mnemonic}, [${formatList(node.operands)}])`;
        case NodeType.Ccw:
            return `Ccw${node.format ?? ""}(${formatList([node.command, node.address, node.flags, node.count])})`;
        case NodeType.Psw: {
            const operands = [node.system, node.key, node.mode, node.program, node.address];
            return `Psw(${node.format ?? ""}, [${formatList(node.amode ? [...operands, node.amode] : operands)}])`;
        }
        case NodeType.Xmode:
            return `Xmode(${node.mode}, ${node.setting})`;
        case NodeType.StorageOperand: {
            const subs = node.subfields?.map(s => formatOpt(s)).join(", ");
            return subs === undefined ? formatNode(node.expr) : `Storage(${formatNode(node.expr)}, [${subs}])`;
        }
        case NodeType.DataOperand: {
            const len = node.explicitLength !== undefined ? `L${node.explicitLength}` : "";
            return `Data(${formatOpt(node.duplication)}, ${node.dataType}${len}, ${formatOpt(node.nominal)})`;
        }
        case NodeType.QuotedValue:
            return `Quoted("${node.text}")`;
        case NodeType.ExprList:
            return `List([${formatList(node.exprs)}])`;
        case NodeType.BinaryOp:
            return `BinOp(${formatNode(node.lhs)}, '${node.operator}', ${formatNode(node.rhs)})`;
        case NodeType.UnaryOp:
            return `UnOp('${node.operator}', ${formatNode(node.operand)})`;
        case NodeType.ParenExpr:
            return `Paren(${formatNode(node.expr)})`;
        case NodeType.Integer:
            return `Integer(${node.value})`;
        case NodeType.SelfDefTerm:
            return `${node.kind}'${node.text}'`;
        case NodeType.Symbol:
            return `Symbol("${node.name}")`;
        case NodeType.AttributeRef:
            return `${node.attribute}'${formatNode(node.symbol)}`;
        case NodeType.CurrentLocation:
            return "Location()";
    }
}
