import { KNNClassifier } from "../src/ml/KNNClassifier";
import { evaluateClassifier } from "../src/core/Evaluation";
import { toyRegistry } from "../src/data/ToyDatasets";

const k = Number(process.argv[2] ?? 3);
const knn = new KNNClassifier({ k, log: { modelName: "ToyKNN", verbose: true } });

// A few single queries, including a dataset name the registry does not know
knn.classify("cancer", [15.8, 2.0]);
knn.classify("customer", [2.2, 14.0]);
knn.classify("unknown", [2.2, 14.0]);

console.log(`\n🔍 ${k} nearest neighbours of [13.9, 1.9] in cancer:`);
for (const n of knn.neighbors("cancer", [13.9, 1.9]) ?? []) {
    console.log(`  #${n.index} [${n.point.join(", ")}] label=${n.label} dist=${n.distance.toFixed(2)}`);
}

// Leave-nothing-out check: classify every training point against its own dataset
for (const name of toyRegistry.names()) {
    const dataset = toyRegistry.get(name);
    if (!dataset) continue;
    const { predictions, accuracy, confusion } = evaluateClassifier(knn, dataset, dataset);
    console.log(`\n📊 ${name}: predictions=[${predictions.join(", ")}] accuracy=${accuracy.toFixed(2)}`);
    console.log(`   tp=${confusion.tp} tn=${confusion.tn} fp=${confusion.fp} fn=${confusion.fn}`);
}
