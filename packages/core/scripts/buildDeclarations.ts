import * as path from "path";
import { NewLineKind, Node, Project } from "ts-morph";

const packageDir = path.join(__dirname, "..");
const readProject = new Project({ tsConfigFilePath: path.join(packageDir, "tsconfig.json"), compilerOptions: { declaration: true } });
const emitResult = readProject.emitToMemory({ emitOnlyDtsFiles: true });

for (const file of emitResult.getFiles())
    readProject.createSourceFile(file.filePath, file.text, { overwrite: true });

const emitMainFile = readProject.getSourceFileOrThrow(path.join(packageDir, "dist/index.d.ts"));
const writeProject = new Project({
    manipulationSettings: {
        newLineKind: NewLineKind.LineFeed,
    },
});
const declarationFile = writeProject.createSourceFile(path.join(packageDir, "lib/tokenbag-core.d.ts"), "", { overwrite: true });
const packageVersion: string = require("../package.json").version;

const writer = readProject.createWriter();

for (const declarations of emitMainFile.getExportedDeclarations().values()) {
    for (const declaration of declarations) {
        if (writer.getLength() > 0)
            writer.newLine();

        if (Node.isVariableDeclaration(declaration)) {
            // update to include the package version
            writer.write(declaration.getVariableStatementOrThrow().getText(true).replace("PACKAGE_VERSION", packageVersion));
        }
        else {
            writer.write(declaration.getText(true));
        }

        writer.newLine();
    }
}

declarationFile.replaceWithText(writer.toString());
declarationFile.addImportDeclaration({
    isTypeOnly: true,
    namedImports: [
        "BagConfiguration",
        "BagToken",
        "ConfigurationDiagnostic",
        "LoggingEnvironment",
        "ResolvedBagConfiguration",
    ],
    moduleSpecifier: "@tokenbag/types",
});
declarationFile.saveSync();

const diagnostics = writeProject.getPreEmitDiagnostics();
if (diagnostics.length > 0) {
    console.log(writeProject.formatDiagnosticsWithColorAndContext(diagnostics));
    process.exit(1);
}
